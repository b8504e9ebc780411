// src/services/__fixtures__/memoryStores.ts
import { LocalFileStore, RemoteFileStore, SinkResult } from '../../types/sink.types';

export class MemoryFileStore implements LocalFileStore {
    public readonly files = new Map<string, Buffer>();

    constructor(private readonly failing: (filePath: string) => boolean = () => false) { }

    async writeLocal(filePath: string, bytes: Buffer): Promise<SinkResult> {
        if (this.failing(filePath)) {
            return { ok: false, location: filePath, error: 'EACCES: permission denied' };
        }
        this.files.set(filePath, bytes);
        return { ok: true, location: filePath };
    }

    text(filePath: string): string | undefined {
        return this.files.get(filePath)?.toString('utf8');
    }
}

export class MemoryRemoteStore implements RemoteFileStore {
    public readonly directories: string[] = [];
    public readonly files = new Map<string, Buffer>();

    constructor(private readonly failing: (remotePath: string) => boolean = () => false) { }

    async ensureRemoteDir(remotePath: string): Promise<SinkResult> {
        if (this.failing(remotePath)) {
            return { ok: false, location: remotePath, error: 'HTTP 403: Permission denied' };
        }
        this.directories.push(remotePath);
        return { ok: true, location: remotePath };
    }

    async writeRemote(remotePath: string, bytes: Buffer): Promise<SinkResult> {
        if (this.failing(remotePath)) {
            return { ok: false, location: remotePath, error: 'HTTP 500' };
        }
        this.files.set(remotePath, bytes);
        return { ok: true, location: remotePath };
    }
}
