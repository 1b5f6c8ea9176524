#!/usr/bin/env node
// backend/tools/env/check.cli.ts
import { runCli } from "../../shared/src/cli/main";
import { initLogger } from "../../shared/src/logger";
import { runEnvCheck } from "./envCheck";

initLogger("env-check");
void runCli((args, io) => runEnvCheck(args, io));
