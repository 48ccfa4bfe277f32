import type { SourcePaths } from '../config.js';
import type { Confirm } from '../utils/prompt.js';

export interface CommandContext {
    paths: SourcePaths;
    confirm: Confirm;
}
