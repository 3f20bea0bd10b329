import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Spinner wrapper for consistent UX across the CLI
 */
export class Spinner {
    private spinner: Ora;

    constructor() {
        this.spinner = ora({
            color: 'cyan',
            spinner: 'dots',
            stream: process.stderr,
        });
    }

    start(message: string): void {
        this.spinner.start(chalk.dim(`  ${message}`));
    }

    success(message: string): void {
        this.spinner.succeed(chalk.green(`  ${message}`));
    }

}
