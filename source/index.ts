#!/usr/bin/env -S node --import tsx
import { Cli } from "./cli.ts";

const cli = new Cli({ args: process.argv.slice(2) });
process.exitCode = await cli.run();
