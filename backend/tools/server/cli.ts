#!/usr/bin/env node
// backend/tools/server/cli.ts
import { runCli } from "../../shared/src/cli/main";
import { initLogger } from "../../shared/src/logger";
import { runServerStart } from "./index";

initLogger("server");
void runCli((args, io) => runServerStart(args, io));
