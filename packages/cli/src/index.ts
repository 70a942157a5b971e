#!/usr/bin/env node
import { run } from './run';

process.exit(run(process.argv.slice(2)));
