#!/usr/bin/env node
import { runCommand } from "./commands.js";

async function main(): Promise<number> {
  const [, , ...argv] = process.argv;
  return await runCommand(argv, {
    cwd: process.cwd(),
    env: process.env,
    stdout: (line) => {
      console.log(line);
    },
    stderr: (line) => {
      console.error(line);
    },
  });
}

void main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(String(error));
    process.exitCode = 1;
  },
);
