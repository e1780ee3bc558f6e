/**
 * Terminal prompts for interactive commands
 */

import { createInterface } from "readline";

export interface Prompt {
  ask: (question: string) => Promise<string>;
  askHidden: (question: string) => Promise<string>;
  close: () => void;
}

/**
 * Create readline-backed prompts on stdin/stdout
 */
export function createPrompt(): Prompt {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return {
    ask: (question: string) =>
      new Promise((resolve) => {
        rl.question(question, resolve);
      }),
    askHidden: (question: string) =>
      new Promise((resolve) => {
        process.stdout.write(question);
        let input = "";

        const stdin = process.stdin;
        const wasRaw = stdin.isRaw;
        if (stdin.isTTY) {
          stdin.setRawMode(true);
        }
        stdin.resume();
        stdin.setEncoding("utf8");

        const onData = (char: string) => {
          switch (char) {
            case "\n":
            case "\r":
            case "\u0004": // Ctrl+D
              stdin.removeListener("data", onData);
              if (stdin.isTTY) {
                stdin.setRawMode(wasRaw ?? false);
              }
              process.stdout.write("\n");
              resolve(input);
              break;
            case "\u0003": // Ctrl+C
              process.exit();
              break;
            case "\u007F": // Backspace
              if (input.length > 0) {
                input = input.slice(0, -1);
                process.stdout.write("\b \b");
              }
              break;
            default:
              input += char;
              process.stdout.write("*");
          }
        };

        stdin.on("data", onData);
      }),
    close: () => rl.close(),
  };
}

/**
 * Ask how long to wait before the first check. Blank or invalid answers
 * keep the default.
 */
export async function promptStartupDelay(prompt: Prompt, defaultMinutes: number): Promise<number> {
  const answer = await prompt.ask(`Startup delay in minutes [${defaultMinutes}]: `);
  return parseStartupDelay(answer, defaultMinutes);
}

export function parseStartupDelay(answer: string, defaultMinutes: number): number {
  const trimmed = answer.trim();
  if (trimmed === "") return defaultMinutes;
  const minutes = Number(trimmed);
  return Number.isFinite(minutes) && minutes >= 0 ? minutes : defaultMinutes;
}
