#!/usr/bin/env -S tsx
import { Command } from 'commander';
import chalk from 'chalk';
import { LogLevel, Logger, resolveWorkspaceRoot } from '@fosint/core';
import { run } from './utils/errors.js';
import { signinCommand, signoutCommand, signupCommand, whoamiCommand, type SigninOptions, type SignupOptions } from './commands/auth.js';
import { projectCommand } from './commands/project.js';
import { leakCommand } from './commands/leak.js';
import { pgpCommand } from './commands/pgp.js';
import { cryptoCommand } from './commands/crypto.js';
import { dorkCommand } from './commands/dork.js';
import { metadataCommand } from './commands/metadata.js';
import { monitorCommand } from './commands/monitor.js';
import { torCommand } from './commands/tor.js';
import { settingsCommand, themeCommand } from './commands/settings.js';
import { scanCommand, type ScanOptions } from './commands/scan.js';
import { hostCommand } from './commands/host.js';
import { reportGenerateCommand } from './commands/report.js';
import { doctorCommand } from './commands/doctor.js';

const CLI_VERSION = '1.0.0';

const program = new Command();

program
    .name('fosint')
    .description('Dark web and surface web OSINT toolkit')
    .version(CLI_VERSION)
    .option('--debug', 'Enable debug logging (same as FOSINT_DEBUG=1)')
    .hook('preAction', () => {
        if (program.opts<{ debug?: boolean }>().debug) {
            Logger.setLevel(LogLevel.DEBUG);
        }
    })
    .addHelpText('before', chalk.bold.hex('#007acc')(`
   ___          _       _
  / __\\__  ___ (_)_ __ | |_
 / _\\/ _ \\/ __|| | '_ \\| __|
/ / | (_) \\__ \\| | | | | |_
\\/   \\___/|___/|_|_| |_|\\__|
    `))
    .addHelpText('after', `
Workspace: data, sessions, reports and config/ live under FOSINT_HOME
(default: the current directory).
    `);

program
    .command('signup')
    .description('Create a local analyst account')
    .argument('<username>', 'Account name')
    .option('-e, --email <email>', 'Email address (prompted when omitted)')
    .option('-p, --password <password>', 'Password (prompted when omitted)')
    .addHelpText('after', `
Examples:
  $ fosint signup alice --email alice@example.com
    `)
    .action(run(async (username: string, options: SignupOptions) => {
        await signupCommand(resolveWorkspaceRoot(), username, options);
    }));

program
    .command('signin')
    .description('Sign in and start a session')
    .argument('<username>', 'Account name')
    .option('-p, --password <password>', 'Password (prompted when omitted)')
    .option('-r, --remember', 'Keep the session for 7 days instead of 24 hours')
    .action(run(async (username: string, options: SigninOptions) => {
        await signinCommand(resolveWorkspaceRoot(), username, options);
    }));

program
    .command('signout')
    .description('End the current session')
    .action(run(async () => {
        await signoutCommand(resolveWorkspaceRoot());
    }));

program
    .command('whoami')
    .description('Show the signed-in user and selected project')
    .action(run(async () => {
        await whoamiCommand(resolveWorkspaceRoot());
    }));

program.addCommand(projectCommand);
program.addCommand(leakCommand);
program.addCommand(pgpCommand);
program.addCommand(cryptoCommand);
program.addCommand(dorkCommand);

program
    .command('scan')
    .description('Crawl .onion sites through Tor')
    .argument('<urls...>', 'Seed URLs')
    .option('-d, --depth <n>', 'Maximum link depth (default from settings)')
    .option('-m, --max-pages <n>', 'Stop after this many pages (default from settings)')
    .option('-f, --format <format>', 'Export results as json or csv')
    .option('-o, --output <file>', 'Write the export to a file')
    .addHelpText('after', `
Examples:
  $ fosint scan http://example2zyxwvutsrqp.onion --depth 1
  $ fosint scan http://a.onion http://b.onion -f csv -o scan.csv
    `)
    .action(run(async (urls: string[], options: ScanOptions) => {
        await scanCommand(resolveWorkspaceRoot(), urls, options);
    }));

program.addCommand(metadataCommand);

program
    .command('host')
    .description('Look up open ports, services and CVEs for an IP address')
    .argument('<ip>', 'IPv4 or IPv6 address')
    .action(run(async (ip: string) => {
        await hostCommand(resolveWorkspaceRoot(), ip);
    }));

program.addCommand(monitorCommand);

program
    .command('report')
    .description('Generate reports for the current project')
    .command('generate')
    .description('Write a Markdown or PDF report of the current project to reports/')
    .option('-f, --format <format>', 'md or pdf', 'md')
    .option('-a, --author <name>', 'Analyst name (defaults to the signed-in user)')
    .addHelpText('after', `
Examples:
  $ fosint report generate
  $ fosint report generate --format pdf --author "Case Team"
    `)
    .action(run(async (options: { format?: string; author?: string }) => {
        await reportGenerateCommand(resolveWorkspaceRoot(), options);
    }));

program.addCommand(torCommand);
program.addCommand(settingsCommand);

program
    .command('theme')
    .description('Show or set the colour theme')
    .argument('[theme]', 'dark or light')
    .action(run(async (theme: string | undefined) => {
        await themeCommand(resolveWorkspaceRoot(), theme);
    }));

program
    .command('doctor')
    .description('Check Node.js, Tor, settings and the workspace')
    .action(run(async () => {
        await doctorCommand(resolveWorkspaceRoot());
    }));

await program.parseAsync();
