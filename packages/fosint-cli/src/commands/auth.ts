import chalk from 'chalk';
import { AuthError, SESSION_HOURS, REMEMBER_ME_HOURS } from '@fosint/core';
import { CliContext, type ContextOverrides } from '../utils/context.js';
import { promptInput, promptPassword } from '../utils/prompt.js';

export interface SignupOptions {
    email?: string;
    password?: string;
}

export interface SigninOptions {
    password?: string;
    remember?: boolean;
}

export async function signupCommand(root: string, username: string, options: SignupOptions = {}, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const email = options.email ?? await promptInput('Email:');
    const password = options.password ?? await promptPassword();

    const user = await ctx.users.register(username, email, password);
    console.log(ctx.ui.success(`✓ Account created for ${user.username}`));
    console.log(chalk.dim('  Sign in with: fosint signin ' + user.username));
}

export async function signinCommand(root: string, username: string, options: SigninOptions = {}, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const password = options.password ?? await promptPassword();

    const user = await ctx.users.authenticate(username, password);
    if (!user) {
        throw new AuthError('Invalid username or password');
    }
    if (ctx.sessions.currentSession) {
        await ctx.sessions.end();
    }
    const session = await ctx.sessions.start(user, options.remember ?? false);
    ctx.useUser(user);

    const hours = options.remember ? REMEMBER_ME_HOURS : SESSION_HOURS;
    console.log(ctx.ui.success(`✓ Signed in as ${user.username}`));
    console.log(chalk.dim(`  Session valid for ${hours}h (until ${session.expiresAt})`));
}

export async function signoutCommand(root: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const user = ctx.user;
    if (!user) {
        console.log(chalk.dim('Not signed in.'));
        return;
    }
    await ctx.sessions.end();
    console.log(ctx.ui.success(`✓ Signed out ${user.username}`));
}

export async function whoamiCommand(root: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const user = ctx.user;
    if (!user) {
        console.log(chalk.dim('Not signed in.'));
        return;
    }
    const session = ctx.sessions.currentSession;
    const project = ctx.projects.currentProject;
    console.log(`${ctx.ui.heading(user.username)} ${ctx.ui.muted(`(${user.userId})`)}`);
    if (session) console.log(`  Session expires: ${session.expiresAt}`);
    console.log(`  Current project: ${project ? `${project.name} ${ctx.ui.muted(project.projectId)}` : ctx.ui.muted('none')}`);
}
