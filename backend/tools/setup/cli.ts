#!/usr/bin/env node
// backend/tools/setup/cli.ts
import { runCli } from "../../shared/src/cli/main";
import { initLogger } from "../../shared/src/logger";
import { runSetup } from "./index";

initLogger("setup");
void runCli((args, io) => runSetup(args, io));
