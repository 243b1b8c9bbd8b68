import * as readline from 'readline';

/**
 * Ask one question on a line-oriented stream. Resolves to `null` when the user
 * cancels (Ctrl-C) or the input ends before an answer arrives.
 */
export function promptLine(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<string | null> {
  return new Promise(resolve => {
    const rl = readline.createInterface({ input, output });
    let answered = false;

    rl.on('SIGINT', () => rl.close());
    rl.on('close', () => {
      if (!answered) resolve(null);
    });

    rl.question(question, answer => {
      answered = true;
      rl.close();
      resolve(answer);
    });
  });
}
