#!/usr/bin/env node
import { main } from "./program.js";
import { runGistNew } from "./run.js";

process.exitCode = await main(process.argv, runGistNew);
