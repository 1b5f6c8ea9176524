#!/usr/bin/env node
// backend/tools/preload/cli.ts
import { runCli } from "../../shared/src/cli/main";
import { initLogger } from "../../shared/src/logger";
import { runPreload } from "./index";

initLogger("preload");
void runCli((args, io) => runPreload(args, io));
