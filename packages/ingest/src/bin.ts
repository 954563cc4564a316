#!/usr/bin/env node
import './env.js';
import { runCli } from './cli.js';

runCli(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  err => {
    console.error(err);
    process.exitCode = 1;
  }
);
