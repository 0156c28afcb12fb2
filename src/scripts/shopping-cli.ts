#!/usr/bin/env node
import readline from "readline/promises";
import { ShoppingApiClient } from "../cli/apiClient";
import { runMenu } from "../cli/menu";
import type { Prompter } from "../cli/prompts";
import { getApiUrl } from "../config";

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout,
});

rl.on("close", () => {
  console.log("\n\nExiting... Thank you for using Smart Shopping List!");
  process.exit(0);
});

rl.on("SIGINT", () => rl.close());

const prompter: Prompter = {
  ask: (question) => rl.question(question),
  print: (line = "") => console.log(line),
};

async function main() {
  const apiUrl = getApiUrl();
  console.log(`Using Shopping API at ${apiUrl}`);

  await runMenu(prompter, new ShoppingApiClient(apiUrl));
  rl.removeAllListeners("close");
  rl.close();
}

main().catch((error) => {
  console.error("Shopping CLI crashed:", error);
  process.exitCode = 1;
  rl.removeAllListeners("close");
  rl.close();
});
