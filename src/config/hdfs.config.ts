// src/config/hdfs.config.ts
import { AppConfig } from './types';

export class HdfsConfig {
    public readonly enabled: boolean;
    public readonly endpoint: string;
    public readonly rootPath: string;
    public readonly user: string | undefined;
    public readonly timeoutMs: number;

    constructor(appConfig: AppConfig) {
        this.enabled = appConfig.HDFS_ENABLED;
        this.endpoint = appConfig.HDFS_URL.replace(/\/+$/, '');
        this.rootPath = appConfig.HDFS_PATH.replace(/\/+$/, '') || '/';
        this.user = appConfig.HDFS_USER || undefined;
        this.timeoutMs = appConfig.HDFS_TIMEOUT_MS;
    }
}
