import inquirer from 'inquirer';

/**
 * Asks the user a yes/no question.
 */
export type Confirm = (message: string) => Promise<boolean>;

export const confirmPrompt: Confirm = async (message) => {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
        {
            type: 'confirm',
            name: 'confirmed',
            message,
            default: false
        }
    ]);
    return confirmed;
};
