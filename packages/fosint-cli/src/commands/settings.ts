import { Command } from 'commander';
import chalk from 'chalk';
import {
    API_KEY_NAMES,
    ConfigError,
    defaultSettings,
    getSettingValue,
    isApiKeyName,
    maskKey,
    removeApiKey,
    resolveWorkspaceRoot,
    setApiKey,
    setSettingValue,
    type ApiKeyName,
} from '@fosint/core';
import { CliContext, type ContextOverrides } from '../utils/context.js';
import { run } from '../utils/errors.js';

/**
 * `fosint settings`: manage config/settings.json
 *
 * Holds API keys, rate limits, Tor ports, crawler and dorking defaults and
 * the colour theme.
 */

function requireKeyName(name: string): ApiKeyName {
    if (!isApiKeyName(name)) {
        throw new ConfigError(`Unknown API key "${name}" (expected one of: ${API_KEY_NAMES.join(', ')})`);
    }
    return name;
}

export async function settingsShowCommand(root: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const { settings, ui } = ctx;

    console.log(ui.heading('\n  fosint Settings'));
    console.log(ui.muted(`  ${ctx.paths.settingsFile}\n`));

    console.log(chalk.bold('  API Keys:'));
    for (const name of API_KEY_NAMES) {
        const key = settings.api_keys[name];
        console.log(`    ${ui.accent(name)}: ${key ? ui.muted(maskKey(key)) : ui.muted('not set')}`);
    }
    console.log('');

    console.log(chalk.bold('  Tor:'));
    console.log(`    SOCKS: ${settings.tor.socks_host}:${settings.tor.socks_port}`);
    console.log(`    Control port: ${settings.tor.control_port}`);
    console.log(`    Config file: ${settings.tor.config_file}`);
    console.log(`    Surface web over Tor: ${settings.tor.use_for_surface_web}`);
    console.log('');

    console.log(chalk.bold('  Rate Limits (requests/minute):'));
    for (const [name, limit] of Object.entries(settings.rate_limits)) {
        console.log(`    ${name}: ${limit}`);
    }
    console.log('');

    console.log(chalk.bold('  Scanner:'));
    console.log(`    Max depth: ${settings.scanner.max_depth}, max pages: ${settings.scanner.max_pages}`);
    console.log(`    Delay: ${settings.scanner.delay_min_ms}-${settings.scanner.delay_max_ms}ms, timeout: ${settings.scanner.timeout_ms}ms`);
    console.log('');

    console.log(chalk.bold('  Dorking:'));
    console.log(`    Max results: ${settings.dorking.max_results}, delay: ${settings.dorking.delay_ms}ms, language: ${settings.dorking.language}`);
    console.log('');

    console.log(chalk.bold('  UI:'));
    console.log(`    Theme: ${settings.ui.theme}`);
    console.log(`    Auto-save projects: ${settings.projects.auto_save}`);
    console.log('');
}

export async function settingsSetKeyCommand(root: string, name: string, apiKey: string, overrides: ContextOverrides = {}): Promise<void> {
    const keyName = requireKeyName(name);
    const ctx = await CliContext.open(root, overrides);
    ctx.saveSettings(setApiKey(ctx.settings, keyName, apiKey));
    console.log(chalk.green(`  ✓ ${keyName} API key saved: ${maskKey(apiKey)}`));
    console.log(chalk.dim(`    Stored in ${ctx.paths.settingsFile}`));
}

export async function settingsRemoveKeyCommand(root: string, name: string, overrides: ContextOverrides = {}): Promise<void> {
    const keyName = requireKeyName(name);
    const ctx = await CliContext.open(root, overrides);
    ctx.saveSettings(removeApiKey(ctx.settings, keyName));
    console.log(chalk.green(`  ✓ ${keyName} API key removed`));
}

export async function settingsSetCommand(root: string, key: string, value: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    ctx.saveSettings(setSettingValue(ctx.settings, key, value));
    console.log(chalk.green(`  ✓ ${key} = ${value}`));
}

export async function settingsGetCommand(root: string, key: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const value = getSettingValue(ctx.settings, key);

    if (value === undefined) {
        console.log(chalk.dim(`  ${key} is not set`));
    } else if (typeof value === 'object') {
        console.log(`  ${key} = ${JSON.stringify(value, null, 2)}`);
    } else {
        console.log(`  ${key} = ${String(value)}`);
    }
}

export async function settingsResetCommand(root: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    ctx.saveSettings(defaultSettings());
    console.log(chalk.green('  ✓ Settings reset to defaults'));
    console.log(chalk.dim(`    ${ctx.paths.settingsFile}`));
}

export async function settingsPathCommand(root: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    console.log(ctx.paths.settingsFile);
}

export async function themeCommand(root: string, theme: string | undefined, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    if (!theme) {
        console.log(`  Current theme: ${ctx.ui.accent(ctx.settings.ui.theme)}`);
        return;
    }
    ctx.saveSettings(setSettingValue(ctx.settings, 'ui.theme', theme));
    console.log(ctx.ui.success(`  ✓ Theme set to ${theme}`));
}

export const settingsCommand = new Command('settings')
    .description('Manage config/settings.json')
    .addHelpText('after', `
Examples:
  $ fosint settings show
  $ fosint settings set-key haveibeenpwned <key>
  $ fosint settings set tor.socks_port 9150
  $ fosint settings get rate_limits
    `);

settingsCommand
    .command('show')
    .description('Show all settings (keys masked)')
    .action(run(async () => {
        await settingsShowCommand(resolveWorkspaceRoot());
    }));

settingsCommand
    .command('get')
    .description('Read a setting by dot-notation key')
    .argument('<key>', 'e.g. tor.socks_port')
    .action(run(async (key: string) => {
        await settingsGetCommand(resolveWorkspaceRoot(), key);
    }));

settingsCommand
    .command('set')
    .description('Change a setting by dot-notation key')
    .argument('<key>', 'e.g. scanner.max_depth')
    .argument('<value>', 'New value; true/false and numbers are converted')
    .action(run(async (key: string, value: string) => {
        await settingsSetCommand(resolveWorkspaceRoot(), key, value);
    }));

settingsCommand
    .command('set-key')
    .description('Store an API key')
    .argument('<name>', API_KEY_NAMES.join(', '))
    .argument('<key>', 'API key')
    .action(run(async (name: string, apiKey: string) => {
        await settingsSetKeyCommand(resolveWorkspaceRoot(), name, apiKey);
    }));

settingsCommand
    .command('remove-key')
    .description('Delete an API key')
    .argument('<name>', API_KEY_NAMES.join(', '))
    .action(run(async (name: string) => {
        await settingsRemoveKeyCommand(resolveWorkspaceRoot(), name);
    }));

settingsCommand
    .command('path')
    .description('Print the settings file location')
    .action(run(async () => {
        await settingsPathCommand(resolveWorkspaceRoot());
    }));

settingsCommand
    .command('reset')
    .description('Restore default settings')
    .action(run(async () => {
        await settingsResetCommand(resolveWorkspaceRoot());
    }));
