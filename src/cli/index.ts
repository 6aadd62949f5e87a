/**
 * Console entry point.
 * Run from repo root: npm run calc
 */

import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { runExposureSession } from "./session";
import { derr } from "@/lib/debug";

async function main(): Promise<void> {
  const rl = createInterface({ input: stdin, output: stdout });
  let closed = false;
  // A pending question() is not settled when stdin ends, so race it against close.
  const whenClosed = new Promise<null>((resolve) => {
    rl.once("close", () => {
      closed = true;
      resolve(null);
    });
  });

  try {
    await runExposureSession({
      ask: (prompt) => (closed ? Promise.resolve(null) : Promise.race([rl.question(prompt), whenClosed])),
      write: (line) => {
        stdout.write(`${line}\n`);
      },
    });
  } finally {
    rl.close();
  }
}

main().catch((e: unknown) => {
  derr("Unexpected error in exposure calculator", e);
  process.exitCode = 1;
});
