#!/usr/bin/env -S node --import tsx
import { run } from './dispatch.js';

process.exitCode = run(process.argv.slice(2));
