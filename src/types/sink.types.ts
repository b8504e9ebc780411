// src/types/sink.types.ts
import { JournalRecord } from './journal.types';

export type SinkResult =
    | { ok: true; location: string }
    | { ok: false; location: string; error: string };

/**
 * Local persistence capability. Never rejects; failures come back as `{ ok: false }`.
 */
export interface LocalFileStore {
    writeLocal(filePath: string, bytes: Buffer): Promise<SinkResult>;
}

/**
 * Distributed filesystem capability. Never rejects; failures come back as `{ ok: false }`.
 */
export interface RemoteFileStore {
    ensureRemoteDir(remotePath: string): Promise<SinkResult>;
    writeRemote(remotePath: string, bytes: Buffer): Promise<SinkResult>;
}

export type SinkName = 'local_csv' | 'local_json' | 'hdfs';

/**
 * The finalized record set plus the metadata every artifact shares.
 */
export interface JournalBatch {
    readonly records: readonly JournalRecord[];
    readonly extractionDate: Date;
    readonly sourceFolder: string;
    /** `yyyyMMdd_HHmmss`, shared by every file of the run. */
    readonly fileTimestamp: string;
}

export interface SinkWriteOutcome {
    sink: SinkName;
    ok: boolean;
    locations: string[];
    errors: string[];
}

export interface JournalSinkWriter {
    readonly name: SinkName;
    write(batch: JournalBatch): Promise<SinkWriteOutcome>;
}
