#!/usr/bin/env node

import { consoleIO, runCli } from "./cli";

process.exitCode = runCli(process.argv.slice(2), consoleIO);
