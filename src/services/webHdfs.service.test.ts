// src/services/webHdfs.service.test.ts
import axios, { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import pino from 'pino';
import { WebHdfsService } from './webHdfs.service';

interface RecordedRequest {
    method?: string;
    url?: string;
    params: unknown;
    data: unknown;
}

type Responder = (config: InternalAxiosRequestConfig) => { status: number; data?: unknown; headers?: Record<string, string> };

function stubbedHttp(respond: Responder) {
    const requests: RecordedRequest[] = [];
    const http = axios.create({
        adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
            requests.push({ method: config.method, url: config.url, params: config.params, data: config.data });
            const { status, data = null, headers = {} } = respond(config);
            return { status, statusText: String(status), data, headers, config };
        },
    });
    return { http, requests };
}

const logger = pino({ level: 'silent' });
const DATANODE_URL = 'http://datanode.local:9864/webhdfs/v1/user/journals/2026/03/01/a.csv?op=CREATE&namenoderpcaddress=nn:8020';

describe('WebHdfsService', () => {
    it('creates a directory with MKDIRS as the configured user', async () => {
        const { http, requests } = stubbedHttp(() => ({ status: 200, data: { boolean: true } }));
        const service = new WebHdfsService({ endpoint: 'http://namenode.local:9870', user: 'hadoop', timeoutMs: 1000 }, logger, http);

        const result = await service.ensureRemoteDir('/user/journals/2026/03/01');

        expect(result).toEqual({ ok: true, location: '/user/journals/2026/03/01' });
        expect(requests).toHaveLength(1);
        expect(requests[0]).toMatchObject({
            method: 'put',
            url: 'http://namenode.local:9870/webhdfs/v1/user/journals/2026/03/01',
            params: { op: 'MKDIRS', 'user.name': 'hadoop' },
        });
    });

    it('reports a refused MKDIRS with the remote exception', async () => {
        const { http } = stubbedHttp(() => ({
            status: 403,
            data: { RemoteException: { exception: 'AccessControlException', message: 'Permission denied' } },
        }));
        const service = new WebHdfsService({ endpoint: 'http://namenode.local:9870', timeoutMs: 1000 }, logger, http);

        const result = await service.ensureRemoteDir('/user/journals');

        expect(result).toEqual({
            ok: false,
            location: '/user/journals',
            error: 'MKDIRS /user/journals failed with HTTP 403: Permission denied',
        });
    });

    it('follows the namenode redirect and uploads the bytes to the datanode', async () => {
        const { http, requests } = stubbedHttp(config => config.url === DATANODE_URL
            ? { status: 201 }
            : { status: 307, headers: { location: DATANODE_URL } });
        const service = new WebHdfsService({ endpoint: 'http://namenode.local:9870', timeoutMs: 1000 }, logger, http);

        const result = await service.writeRemote('/user/journals/2026/03/01/a.csv', Buffer.from('a,b\n'));

        expect(result).toEqual({ ok: true, location: '/user/journals/2026/03/01/a.csv' });
        expect(requests).toHaveLength(2);
        expect(requests[0]).toMatchObject({
            url: 'http://namenode.local:9870/webhdfs/v1/user/journals/2026/03/01/a.csv',
            params: { op: 'CREATE', overwrite: 'true' },
        });
        expect(requests[1].url).toBe(DATANODE_URL);
        expect(requests[1].data).toEqual(Buffer.from('a,b\n'));
    });

    it('fails when the namenode does not redirect', async () => {
        const { http, requests } = stubbedHttp(() => ({ status: 200 }));
        const service = new WebHdfsService({ endpoint: 'http://namenode.local:9870', timeoutMs: 1000 }, logger, http);

        const result = await service.writeRemote('/user/journals/a.csv', Buffer.from('x'));

        expect(result).toEqual({
            ok: false,
            location: '/user/journals/a.csv',
            error: 'CREATE /user/journals/a.csv was not redirected to a datanode (HTTP 200)',
        });
        expect(requests).toHaveLength(1);
    });

    it('turns transport errors into a failed result', async () => {
        const http = axios.create({
            adapter: async () => {
                throw new Error('connect ECONNREFUSED 127.0.0.1:9870');
            },
        });
        const service = new WebHdfsService({ endpoint: 'http://localhost:9870', timeoutMs: 1000 }, logger, http);

        expect(await service.writeRemote('/user/journals/a.json', Buffer.from('{}'))).toEqual({
            ok: false,
            location: '/user/journals/a.json',
            error: 'connect ECONNREFUSED 127.0.0.1:9870',
        });
    });
});
