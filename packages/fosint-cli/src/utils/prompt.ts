import inquirer from 'inquirer';

export async function promptPassword(message = 'Password:'): Promise<string> {
    const { password } = await inquirer.prompt<{ password: string }>([
        { type: 'password', name: 'password', message, mask: '*' },
    ]);
    return password;
}

export async function promptInput(message: string): Promise<string> {
    const { value } = await inquirer.prompt<{ value: string }>([
        { type: 'input', name: 'value', message },
    ]);
    return value.trim();
}

export async function promptConfirm(message: string): Promise<boolean> {
    const { ok } = await inquirer.prompt<{ ok: boolean }>([
        { type: 'confirm', name: 'ok', message, default: false },
    ]);
    return ok;
}
