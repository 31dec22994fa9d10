import { promises as fs } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { FileNotFoundError, FileUnreadableError } from '../core/errors';

export interface LoadedFile {
    path: string;
    fileId: string;
    data: Buffer;
    chunks: Buffer[];
}

export const chunkCount = (size: number, batchSize: number): number => Math.ceil(size / batchSize);

/** Slices `data` into `batchSize` chunks; the last one may be shorter. */
export const splitIntoChunks = (data: Buffer, batchSize: number): Buffer[] => {
    const chunks: Buffer[] = [];
    for (let i = 0; i < data.length; i += batchSize) {
        chunks.push(data.subarray(i, i + batchSize));
    }
    return chunks;
};

export const normalizePath = (filePath: string): string => {
    let cleanPath = filePath.trim();
    if (cleanPath.startsWith('file:///')) {
        cleanPath = fileURLToPath(cleanPath);
    }
    return path.normalize(cleanPath);
};

/** Reads a file once and splits it; the basename is the transfer's file id. */
export const loadChunks = async (filePath: string, batchSize: number): Promise<LoadedFile> => {
    const cleanPath = normalizePath(filePath);

    let data: Buffer;
    try {
        data = await fs.readFile(cleanPath);
    } catch (err) {
        const cause = err instanceof Error ? err : undefined;
        if (cause && 'code' in cause && cause.code === 'ENOENT') {
            throw new FileNotFoundError(cleanPath, cause);
        }
        throw new FileUnreadableError(cleanPath, cause);
    }

    return {
        path: cleanPath,
        fileId: path.basename(cleanPath),
        data,
        chunks: splitIntoChunks(data, batchSize),
    };
};
