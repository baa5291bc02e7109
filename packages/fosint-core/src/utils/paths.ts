import path from 'path';
import fs from 'fs-extra';

/**
 * Directory layout of a fosint workspace. Everything lives under one root:
 * FOSINT_HOME when set, otherwise the current working directory.
 */
export interface WorkspacePaths {
    root: string;
    data: string;
    users: string;
    projects: string;
    monitoring: string;
    sessions: string;
    reports: string;
    temp: string;
    config: string;
    settingsFile: string;
    torConfigFile: string;
}

export function resolveWorkspaceRoot(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
    const home = env.FOSINT_HOME?.trim();
    return home ? path.resolve(cwd, home) : cwd;
}

export function getWorkspacePaths(root: string = resolveWorkspaceRoot()): WorkspacePaths {
    const data = path.join(root, 'data');
    const config = path.join(root, 'config');
    return {
        root,
        data,
        users: path.join(data, 'users'),
        projects: path.join(data, 'projects'),
        monitoring: path.join(data, 'monitoring'),
        sessions: path.join(root, 'sessions'),
        reports: path.join(root, 'reports'),
        temp: path.join(root, 'temp'),
        config,
        settingsFile: path.join(config, 'settings.json'),
        torConfigFile: path.join(config, 'tor_config.txt'),
    };
}

export function ensureDirectories(paths: WorkspacePaths): void {
    for (const dir of [paths.data, paths.users, paths.projects, paths.monitoring, paths.sessions, paths.reports, paths.temp, paths.config]) {
        fs.ensureDirSync(dir);
    }
}
