/**
 * SHELL: Teardown confirmation
 */

import inquirer from 'inquirer';

/** Exit code of an `up` the operator declined. */
export const ABORTED_EXIT_CODE = 1;

export type Ask = (message: string) => Promise<boolean>;

export interface ConfirmOptions {
    /** `--yes` was given. */
    yes: boolean;
    /** stdin is a terminal. */
    interactive: boolean;
    ask?: Ask;
}

const askInquirer: Ask = async (message) => {
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([{
        type: 'confirm',
        name: 'confirm',
        message,
        default: false,
    }]);
    return confirm;
};

/** Resolves true when the run may proceed. Only prompts on a terminal without `--yes`. */
export async function confirmTeardown(message: string, options: ConfirmOptions): Promise<boolean> {
    if (options.yes || !options.interactive) return true;
    return (options.ask ?? askInquirer)(message);
}
