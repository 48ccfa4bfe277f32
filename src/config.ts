import path from 'path';
import envPaths from 'env-paths';
import { ConfigError } from './utils/errors.js';

export const CONFIG = {
    // Name the platform config directory is keyed by
    appName: 'srcgen',

    // Registry file inside the config directory
    sourcesFileName: 'sources.ini',

    // Reserved entry marking templates stored on this machine
    localSourceName: 'local',
    localSourceValue: 'LOCAL',

    // Overrides the platform config directory when set
    configDirEnv: 'SRCGEN_CONFIG_DIR'
};

export interface SourcePaths {
    dir: string;
    file: string;
}

/**
 * Local configuration directory for the application, following the
 * platform's conventions unless `SRCGEN_CONFIG_DIR` is set.
 */
export function resolveConfigDir(appName: string = CONFIG.appName, env: NodeJS.ProcessEnv = process.env): string {
    const override = env[CONFIG.configDirEnv];
    if (override && override.trim()) {
        return path.resolve(override);
    }

    const dir = envPaths(appName, { suffix: '' }).config;
    if (!dir) {
        throw new ConfigError('CONFIG_DIR_UNRESOLVED', `Unable to determine a configuration directory for "${appName}"`);
    }
    return dir;
}

export function resolveSourcePaths(dir: string = resolveConfigDir()): SourcePaths {
    return {
        dir,
        file: path.join(dir, CONFIG.sourcesFileName)
    };
}
