#!/usr/bin/env node
import { createInterface } from 'readline/promises';
import { BANNER, MENU_LINES, PROMPT, runChoice } from '../lib/menu.js';

async function main(): Promise<void> {
  console.log(BANNER);
  for (const line of MENU_LINES) console.log(line);

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt(PROMPT);
  rl.prompt();
  try {
    for await (const line of rl) {
      if (await runChoice(line) === 'exit') break;
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}

main().catch(e => { console.error(e); process.exit(1); });
