// src/services/__fixtures__/runConfiguration.ts
import { RunConfiguration } from '../../config/types';
import { testCrawlSettings } from '../../journal/__fixtures__/scriptedRenderer';

export function testRunConfiguration(overrides: Partial<RunConfiguration> = {}): RunConfiguration {
    return {
        input: { kind: 'archive', directory: '/data/captures' },
        outputDirectory: '/data/out',
        outputFormat: 'both',
        remote: { enabled: false },
        crawl: testCrawlSettings(),
        logsDirectory: '/data/logs',
        ...overrides,
    };
}
