// src/services/webHdfs.service.ts
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { Logger } from 'pino';
import { getErrorMessageAndStack } from '../utils/errorUtils';
import { RemoteFileStore, SinkResult } from '../types/sink.types';

export interface WebHdfsOptions {
    endpoint: string;
    user?: string;
    timeoutMs: number;
}

/**
 * Minimal WebHDFS REST client: MKDIRS, and the two-step CREATE where the
 * namenode answers with a redirect to the datanode that takes the bytes.
 */
export class WebHdfsService implements RemoteFileStore {
    private readonly serviceBaseLogger: Logger;
    private readonly http: AxiosInstance;

    constructor(private readonly options: WebHdfsOptions, parentLogger: Logger, http?: AxiosInstance) {
        this.serviceBaseLogger = parentLogger.child({ service: 'WebHdfsService', endpoint: options.endpoint });
        this.http = http ?? axios.create();
    }

    private getMethodLogger(methodName: string, remotePath: string): Logger {
        return this.serviceBaseLogger.child({ serviceMethod: `WebHdfsService.${methodName}`, remotePath });
    }

    private operationUrl(remotePath: string): string {
        const normalized = remotePath.startsWith('/') ? remotePath : `/${remotePath}`;
        return `${this.options.endpoint}/webhdfs/v1${encodeURI(normalized)}`;
    }

    private operationParams(op: string, extra: Record<string, string> = {}): Record<string, string> {
        return {
            op,
            ...extra,
            ...(this.options.user ? { 'user.name': this.options.user } : {}),
        };
    }

    private describeFailure(response: AxiosResponse): string {
        const remoteException: unknown = response.data?.RemoteException?.message;
        const detail = typeof remoteException === 'string' ? `: ${remoteException}` : '';
        return `HTTP ${response.status}${detail}`;
    }

    public async ensureRemoteDir(remotePath: string): Promise<SinkResult> {
        const logger = this.getMethodLogger('ensureRemoteDir', remotePath);
        try {
            const response = await this.http.put(this.operationUrl(remotePath), null, {
                params: this.operationParams('MKDIRS'),
                timeout: this.options.timeoutMs,
                validateStatus: () => true,
            });
            if (response.status !== 200 || response.data?.boolean === false) {
                const error = `MKDIRS ${remotePath} failed with ${this.describeFailure(response)}`;
                logger.error({ event: 'hdfs_mkdirs_failed', status: response.status }, error);
                return { ok: false, location: remotePath, error };
            }
            logger.debug({ event: 'hdfs_mkdirs_success' }, `Remote directory ${remotePath} ready.`);
            return { ok: true, location: remotePath };
        } catch (error) {
            const { message, stack } = getErrorMessageAndStack(error);
            logger.error({ event: 'hdfs_mkdirs_error', err: { message, stack } }, `MKDIRS ${remotePath} failed: ${message}`);
            return { ok: false, location: remotePath, error: message };
        }
    }

    public async writeRemote(remotePath: string, bytes: Buffer): Promise<SinkResult> {
        const logger = this.getMethodLogger('writeRemote', remotePath);
        try {
            const redirect = await this.http.put(this.operationUrl(remotePath), null, {
                params: this.operationParams('CREATE', { overwrite: 'true' }),
                timeout: this.options.timeoutMs,
                maxRedirects: 0,
                validateStatus: () => true,
            });
            const location: unknown = redirect.headers['location'];
            if (redirect.status !== 307 || typeof location !== 'string' || location === '') {
                const error = `CREATE ${remotePath} was not redirected to a datanode (${this.describeFailure(redirect)})`;
                logger.error({ event: 'hdfs_create_no_redirect', status: redirect.status }, error);
                return { ok: false, location: remotePath, error };
            }

            const upload = await this.http.put(location, bytes, {
                headers: { 'Content-Type': 'application/octet-stream' },
                timeout: this.options.timeoutMs,
                maxBodyLength: Infinity,
                validateStatus: () => true,
            });
            if (upload.status !== 201) {
                const error = `Upload of ${remotePath} failed with ${this.describeFailure(upload)}`;
                logger.error({ event: 'hdfs_upload_failed', status: upload.status }, error);
                return { ok: false, location: remotePath, error };
            }
            logger.info({ event: 'hdfs_upload_success', byteLength: bytes.length }, `Uploaded ${remotePath}.`);
            return { ok: true, location: remotePath };
        } catch (error) {
            const { message, stack } = getErrorMessageAndStack(error);
            logger.error({ event: 'hdfs_upload_error', err: { message, stack } }, `Upload of ${remotePath} failed: ${message}`);
            return { ok: false, location: remotePath, error: message };
        }
    }
}
