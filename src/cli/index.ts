#!/usr/bin/env node
/**
 * clipscribe CLI
 *
 * Usage:
 *   clipscribe <url> [--work-dir <dir>] [--output <file>] [--copy] [--share] [--json]
 */
import { installSignalHandlers, runCli } from "./program.js";

installSignalHandlers();

process.exitCode = await runCli(process.argv);
