import readline from 'readline';

/** Asks until the answer is one of the two accepted words. */
export function askYesNo(question: string, yes: string, no: string): Promise<boolean> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    const ask = () =>
      rl.question(`${question} `, (answer) => {
        const a = answer.trim().toLowerCase();
        if (a !== yes && a !== no) return ask();
        rl.close();
        resolve(a === yes);
      });
    ask();
  });
}
