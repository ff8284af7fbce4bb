/**
 * FSUtils: the default `FileSource`, backed by fs/promises.
 */
import * as fsp from 'fs/promises';
import * as path from 'path';
import { DirectoryChild, FileSource, FileStat } from '../types/interfaces';

/** Read up to `limit` bytes from the start of a file. */
async function readHead(filePath: string, limit: number): Promise<string> {
    const fd = await fsp.open(filePath, 'r');
    try {
        const { size } = await fd.stat();
        const length = Math.min(limit, size);
        const buf = Buffer.alloc(length);
        const { bytesRead } = await fd.read(buf, 0, length, 0);
        return buf.subarray(0, bytesRead).toString('utf8');
    } finally {
        await fd.close();
    }
}

export class NodeFileSource implements FileSource {
    async stat(filePath: string): Promise<FileStat> {
        const st = await fsp.stat(filePath);
        return { size: st.size, isFile: st.isFile(), isDirectory: st.isDirectory() };
    }

    /** `limit` of Infinity reads the whole file. */
    async readFile(filePath: string, limit: number): Promise<string> {
        if (!Number.isFinite(limit)) {
            return fsp.readFile(filePath, 'utf8');
        }
        return readHead(filePath, Math.max(0, Math.floor(limit)));
    }

    async readSample(filePath: string, bytes: number): Promise<string> {
        return readHead(filePath, Math.max(0, Math.floor(bytes)));
    }

    async readDirectory(dirPath: string): Promise<DirectoryChild[]> {
        const dirents = await fsp.readdir(dirPath, { withFileTypes: true });
        return dirents.map(d => ({
            name: d.name,
            path: path.join(dirPath, d.name),
            isFile: d.isFile(),
            isDirectory: d.isDirectory(),
        }));
    }
}

/** Absolute, normalised POSIX-style key for a path. Empty input stays empty. */
export function toKey(filePath: string): string {
    if (!filePath || !filePath.trim()) {
        return '';
    }
    return path.resolve(filePath);
}

export function toPosix(filePath: string): string {
    return filePath.replace(/\\/g, '/');
}
