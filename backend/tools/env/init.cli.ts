#!/usr/bin/env node
// backend/tools/env/init.cli.ts
import { runCli } from "../../shared/src/cli/main";
import { initLogger } from "../../shared/src/logger";
import { runEnvInit } from "./envInit";

initLogger("env-init");
void runCli((args, io) => runEnvInit(args, io));
