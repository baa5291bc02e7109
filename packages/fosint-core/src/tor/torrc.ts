import path from 'path';
import fs from 'fs-extra';

export interface TorConfigValues {
    socksPort: number;
    controlPort: number;
    dataDirectory?: string;
}

export function renderTorConfig(values: TorConfigValues): string {
    const lines = [
        '# Tor configuration used by `fosint tor start`',
        `SocksPort ${values.socksPort}`,
        `ControlPort ${values.controlPort}`,
        'CookieAuthentication 1',
        'ExitPolicy reject *:*',
    ];
    if (values.dataDirectory) {
        lines.push(`DataDirectory ${values.dataDirectory}`);
    }
    return lines.join('\n') + '\n';
}

/** Option lines of a torrc, keyed by option name. Later lines win. */
export function parseTorConfig(content: string): Map<string, string> {
    const options = new Map<string, string>();
    for (const raw of content.split(/\r?\n/)) {
        const line = raw.replace(/#.*$/, '').trim();
        if (!line) continue;
        const space = line.search(/\s/);
        if (space === -1) {
            options.set(line, '');
        } else {
            options.set(line.slice(0, space), line.slice(space + 1).trim());
        }
    }
    return options;
}

/** Write a default torrc unless one exists. Returns true when a file was written. */
export async function ensureTorConfig(filePath: string, values: TorConfigValues): Promise<boolean> {
    if (await fs.pathExists(filePath)) {
        return false;
    }
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeFile(filePath, renderTorConfig(values), 'utf-8');
    return true;
}
