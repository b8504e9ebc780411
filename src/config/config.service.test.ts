// src/config/config.service.test.ts
import path from 'path';
import { buildRunConfiguration, ConfigService, loadAppConfig } from './config.service';
import { parseBooleanFlag } from './schemas';
import { ConfigurationError } from '../utils/errorUtils';

describe('loadAppConfig', () => {
    it('fills every unset variable with its default', () => {
        const config = loadAppConfig({});

        expect(config).toMatchObject({
            NODE_ENV: 'development',
            LOG_LEVEL: 'info',
            LOG_TO_CONSOLE: true,
            INPUT_SOURCE: 'crawl',
            ARCHIVE_CAPTURES: true,
            OUTPUT_FORMAT: 'both',
            CRAWL_MAX_PAGES: 23,
            HDFS_ENABLED: false,
            HDFS_PATH: '/user/journals',
        });
        expect(config.PLAYWRIGHT_CHANNEL).toBe('chrome');
    });

    it('coerces numeric and boolean variables', () => {
        const config = loadAppConfig({ CRAWL_MAX_PAGES: '5', HDFS_ENABLED: 'yes', LOG_TO_CONSOLE: '0' });

        expect(config.CRAWL_MAX_PAGES).toBe(5);
        expect(config.HDFS_ENABLED).toBe(true);
        expect(config.LOG_TO_CONSOLE).toBe(false);
    });

    it('lists every invalid variable', () => {
        let caught: unknown;
        try {
            loadAppConfig({ OUTPUT_FORMAT: 'xml', CRAWL_MAX_PAGES: '0' });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigurationError);
        const issues = caught instanceof ConfigurationError ? caught.issues : [];
        expect(issues.map(issue => issue.split(':')[0])).toEqual(['OUTPUT_FORMAT', 'CRAWL_MAX_PAGES']);
    });
});

describe('parseBooleanFlag', () => {
    it.each([
        ['true', true],
        ['ON', true],
        ['1', true],
        ['false', false],
        ['nope', false],
    ])('reads %s as %s', (value, expected) => {
        expect(parseBooleanFlag(false)(value)).toBe(expected);
    });

    it('falls back to the default for unset and blank values', () => {
        expect(parseBooleanFlag(true)(undefined)).toBe(true);
        expect(parseBooleanFlag(true)('  ')).toBe(true);
    });
});

describe('buildRunConfiguration', () => {
    it('derives a live crawl with archiving from the defaults', () => {
        const config = buildRunConfiguration(loadAppConfig({}));

        expect(config.input).toEqual({
            kind: 'crawl',
            portalUrl: 'https://sinta.kemdiktisaintek.go.id/journals/index/',
            archiveDirectory: path.resolve('./output_journals'),
        });
        expect(config.outputDirectory).toBe(path.resolve('./output_data'));
        expect(config.remote).toEqual({ enabled: false });
        expect(config.crawl.maxPages).toBe(23);
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('applies overrides on top of the environment', () => {
        const config = buildRunConfiguration(loadAppConfig({ HDFS_USER: 'etl' }), {
            inputSource: 'archive',
            inputDirectory: 'captures',
            maxPages: 5,
            outputFormat: 'json',
            hdfsEnabled: true,
            hdfsUrl: 'http://namenode:9870/',
            hdfsPath: '/data/journals/',
        });

        expect(config.input).toEqual({ kind: 'archive', directory: path.resolve('captures') });
        expect(config.outputFormat).toBe('json');
        expect(config.crawl.maxPages).toBe(5);
        expect(config.remote).toEqual({
            enabled: true,
            endpoint: 'http://namenode:9870',
            rootPath: '/data/journals',
            user: 'etl',
            timeoutMs: 30000,
        });
    });

    it('turns archiving off for a live crawl', () => {
        const config = buildRunConfiguration(loadAppConfig({}), { archiveCaptures: false });

        expect(config.input).toMatchObject({ kind: 'crawl', archiveDirectory: null });
    });

    it('rejects a page cap below one', () => {
        expect(() => buildRunConfiguration(loadAppConfig({}), { maxPages: 0 }))
            .toThrow('Page cap must be a positive integer, got 0');
    });
});

describe('ConfigService', () => {
    const savedEnv = { ...process.env };

    afterEach(() => {
        process.env = { ...savedEnv };
    });

    it('exposes the browser launch settings as one frozen object', () => {
        Object.assign(process.env, { PLAYWRIGHT_CHANNEL: 'msedge', PLAYWRIGHT_HEADLESS: 'false', USER_AGENT: 'harvester-test' });

        const { browserSettings } = new ConfigService();

        expect(browserSettings).toEqual({ channel: 'msedge', headless: false, userAgent: 'harvester-test' });
        expect(Object.isFrozen(browserSettings)).toBe(true);
    });
});
