#!/usr/bin/env -S npx tsx

import { runCli } from "../src/commands.ts";

process.exitCode = await runCli(process.argv.slice(2), process.env);
