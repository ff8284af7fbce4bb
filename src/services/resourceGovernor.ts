import * as path from 'path';
import { Minimatch } from 'minimatch';
import { BusyPredicate, CacheConfig, FileStat } from '../types/interfaces';
import { toPosix } from '../utils/fsUtils';

export type PathVerdict =
    | { eligible: true }
    | { eligible: false; reason: 'empty-path' | 'ignored' | 'invalid-extension' };

export type StatVerdict =
    | { eligible: true }
    | { eligible: false; reason: 'not-file' }
    | { eligible: false; reason: 'too-large'; size: number; limit: number };

const MATCH_OPTIONS = { dot: true, nocase: false, matchBase: false };

/**
 * Pure policy: which paths may be processed, and whether there is room to
 * process more right now. Holds no mutable state besides the compiled
 * patterns of the current config.
 */
export class ResourceGovernor {
    private config: CacheConfig;
    private extensions: Set<string>;
    private matchers: Minimatch[];

    constructor(config: CacheConfig, private readonly isHostBusy: BusyPredicate = () => false) {
        this.config = config;
        this.extensions = new Set(config.includeExtensions);
        this.matchers = config.excludePatterns.map(p => new Minimatch(p, MATCH_OPTIONS));
    }

    updateConfig(config: CacheConfig): void {
        this.config = config;
        this.extensions = new Set(config.includeExtensions);
        this.matchers = config.excludePatterns.map(p => new Minimatch(p, MATCH_OPTIONS));
    }

    /** Extension allow-list and ignore patterns; no I/O. */
    checkPath(filePath: string): PathVerdict {
        if (!filePath || !filePath.trim()) {
            return { eligible: false, reason: 'empty-path' };
        }
        const posix = toPosix(filePath);
        for (const m of this.matchers) {
            if (m.match(posix)) {
                return { eligible: false, reason: 'ignored' };
            }
        }
        const ext = path.extname(posix).slice(1).toLowerCase();
        if (!ext || !this.extensions.has(ext)) {
            return { eligible: false, reason: 'invalid-extension' };
        }
        return { eligible: true };
    }

    isPathEligible(filePath: string): boolean {
        return this.checkPath(filePath).eligible;
    }

    /** Directory names the recursive scan may descend into. */
    isTraversableDirectory(dirPath: string): boolean {
        const posix = toPosix(dirPath);
        if (path.posix.basename(posix).startsWith('.')) {
            return false;
        }
        // Patterns like **/node_modules/** only match paths below the folder
        const probe = posix.replace(/\/+$/, '') + '/_';
        return !this.matchers.some(m => m.match(posix) || m.match(probe));
    }

    /** Size ceiling, skipped when `bypassSize` is set for an active resource. */
    checkStat(stat: FileStat, bypassSize = false): StatVerdict {
        if (!stat.isFile) {
            return { eligible: false, reason: 'not-file' };
        }
        if (!bypassSize && stat.size > this.config.maxFileSizeBytes) {
            return { eligible: false, reason: 'too-large', size: stat.size, limit: this.config.maxFileSizeBytes };
        }
        return { eligible: true };
    }

    spareCapacity(activeJobs: number): number {
        return Math.max(0, this.config.maxConcurrentJobs - activeJobs);
    }

    hostBusy(): boolean {
        return this.isHostBusy();
    }
}
