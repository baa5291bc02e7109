import chalk, { type ChalkInstance } from 'chalk';
import type { Theme } from '@fosint/core';

export interface Palette {
    heading: ChalkInstance;
    accent: ChalkInstance;
    text: ChalkInstance;
    muted: ChalkInstance;
    success: ChalkInstance;
    warning: ChalkInstance;
    danger: ChalkInstance;
}

const PALETTES: Record<Theme, Palette> = {
    dark: {
        heading: chalk.bold.hex('#007acc'),
        accent: chalk.hex('#007acc'),
        text: chalk.hex('#ffffff'),
        muted: chalk.hex('#999999'),
        success: chalk.green,
        warning: chalk.yellow,
        danger: chalk.red,
    },
    light: {
        heading: chalk.bold.hex('#004578'),
        accent: chalk.hex('#005a9e'),
        text: chalk.hex('#000000'),
        muted: chalk.hex('#666666'),
        success: chalk.hex('#107c10'),
        warning: chalk.hex('#9d5d00'),
        danger: chalk.hex('#a80000'),
    },
};

export function palette(theme: Theme): Palette {
    return PALETTES[theme];
}

export function severityColor(p: Palette, severity: string): ChalkInstance {
    switch (severity) {
        case 'critical':
        case 'high':
            return p.danger;
        case 'medium':
            return p.warning;
        case 'none':
            return p.success;
        default:
            return p.muted;
    }
}
