import { createInterface } from 'node:readline';

/**
 * Asks the user to confirm with "yes".
 * If --yes is provided, returns true automatically.
 * If not a TTY and --yes is not provided, returns false.
 */
export async function confirm(message: string, options: { yes: boolean }): Promise<boolean> {
    if (options.yes) return true;

    if (!process.stdin.isTTY) {
        console.error('Non-interactive mode. Use --yes to confirm.');
        return false;
    }

    const rl = createInterface({ input: process.stdin, output: process.stdout });

    return new Promise((resolve) => {
        rl.question(`${message} (yes/no) `, (answer) => {
            rl.close();
            resolve(answer.trim().toLowerCase() === 'yes');
        });
    });
}
