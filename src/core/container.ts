/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The single place where every dependency is wired. Each token from types.ts
 * is mapped to a concrete implementation, so when RowComparator says "I need
 * the DirectionsProvider" the container hands back a DirectionsApiClient.
 *
 * How tsyringe works:
 *   - `reflect-metadata` must be imported first — decorators (@inject,
 *     @injectable) store constructor parameter metadata through it.
 *   - `useValue` registers a pre-built value (logger, axios instance, option
 *     slices cut from config).
 *   - `useClass` tells the container to construct the class when needed,
 *     injecting its own dependencies.
 *
 * Swapping a provider (say, a new Routes API version) is one line here.
 */
import 'reflect-metadata';
import axios from 'axios';
import { container } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { type Clock, TOKENS } from './types';

import { InputReaderFactory } from '@application/factories/InputReaderFactory';
import { BatchRunner } from '@application/services/BatchRunner';
import { ComparisonService } from '@application/services/ComparisonService';
import { RowComparator } from '@application/services/RowComparator';
import { GeohashPairAdapter } from '@infrastructure/input/GeohashPairAdapter';
import { ReportWriter } from '@infrastructure/output/ReportWriter';
import { DirectionsApiClient } from '@infrastructure/providers/DirectionsApiClient';
import { RoutesApiClient } from '@infrastructure/providers/RoutesApiClient';
import type { BatchOptions, OutputOptions, ProviderOptions } from '@shared/types';

const httpClient = axios.create({
  timeout: config.http.timeoutMs,
  // Non-2xx bodies still carry provider statuses; the clients interpret them.
  validateStatus: () => true,
});

const clock: Clock = () => performance.now();

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.HttpClient, { useValue: httpClient });
container.register(TOKENS.Clock, { useValue: clock });

container.register<ProviderOptions>(TOKENS.ProviderOptions, {
  useValue: {
    directionsUrl: config.providers.directions.url,
    routesUrl: config.providers.routes.url,
    routesFieldMask: config.providers.routes.fieldMask,
    languageCode: config.http.languageCode,
  },
});
container.register<BatchOptions>(TOKENS.BatchOptions, { useValue: { ...config.batch } });
container.register<OutputOptions>(TOKENS.OutputOptions, { useValue: { ...config.output } });

container.register(TOKENS.DirectionsProvider, { useClass: DirectionsApiClient });
container.register(TOKENS.RoutesProvider, { useClass: RoutesApiClient });
container.register(TOKENS.InputReaderFactory, { useClass: InputReaderFactory });
container.register(TOKENS.DataSourceAdapter, { useClass: GeohashPairAdapter });
container.register(TOKENS.RowComparator, { useClass: RowComparator });
container.register(TOKENS.BatchRunner, { useClass: BatchRunner });
container.register(TOKENS.ReportWriter, { useClass: ReportWriter });
container.register(TOKENS.ComparisonService, { useClass: ComparisonService });

export { container };
