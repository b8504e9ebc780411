// src/container.ts
import 'reflect-metadata';
import { container } from 'tsyringe';

import { ConfigService } from './config/config.service';
import { LoggingService } from './services/logging.service';
import { PlaywrightService } from './services/playwright.service';
import { JournalRunnerService } from './services/journalRunner.service';

/**
 * Process-wide singletons. Stores, sources and sinks are built per run by
 * `JournalRunnerService`.
 */
container.registerSingleton(ConfigService);
container.registerSingleton(LoggingService);
container.registerSingleton(PlaywrightService);
container.registerSingleton(JournalRunnerService);

export default container;
