#!/usr/bin/env node
/**
 * Terminal entry point for the staking walkthrough.
 *
 * Run: npm run demo
 */

import chalk from "chalk";
import { runWalkthrough } from "./walkthrough.js";

const DELAY_MS = 600;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

runWalkthrough({
  print: (line) => console.log(line),
  pause: () => sleep(DELAY_MS),
}).catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
