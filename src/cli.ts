#!/usr/bin/env node
import { IO } from './console/IO.js';
import { runApplication } from './console/Application.js';

process.exitCode = await runApplication(process.argv.slice(2), new IO(process.stdout, process.stderr));
