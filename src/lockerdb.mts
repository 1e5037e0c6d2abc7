#!/usr/bin/env node
// @author lockerdb contributors
// @date 2026-10-19
import { runCli } from './cli.mjs';

process.exitCode = await runCli(process.argv.slice(2));
