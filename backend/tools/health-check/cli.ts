#!/usr/bin/env node
// backend/tools/health-check/cli.ts
import { runCli } from "../../shared/src/cli/main";
import { initLogger } from "../../shared/src/logger";
import { runHealthCheck } from "./index";

initLogger("health-check");
void runCli((args, io) => runHealthCheck(args, io));
