/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency in tsyringe needs a unique identifier so the
 * container knows "when someone asks for X, give them Y." Symbols are used
 * instead of strings so two modules can never collide on the same name.
 *
 * Grouped by architectural layer; register a new token here before wiring it
 * in container.ts.
 */
export const TOKENS = {
  // Infrastructure — low-level tools
  Logger: Symbol.for('Logger'),
  HttpClient: Symbol.for('HttpClient'),
  Clock: Symbol.for('Clock'),

  // Options — config slices handed to classes that must stay testable without env
  ProviderOptions: Symbol.for('ProviderOptions'),
  BatchOptions: Symbol.for('BatchOptions'),
  OutputOptions: Symbol.for('OutputOptions'),

  // Providers — swappable routing clients behind IRoutingProvider
  DirectionsProvider: Symbol.for('DirectionsProvider'),
  RoutesProvider: Symbol.for('RoutesProvider'),

  // Adapters and factories — input transformation
  InputReaderFactory: Symbol.for('InputReaderFactory'),
  DataSourceAdapter: Symbol.for('DataSourceAdapter'),

  // Services — application-level orchestrators
  RowComparator: Symbol.for('RowComparator'),
  BatchRunner: Symbol.for('BatchRunner'),
  ReportWriter: Symbol.for('ReportWriter'),
  ComparisonService: Symbol.for('ComparisonService'),
} as const;

/** Monotonic millisecond clock; injected so response timings are deterministic in tests. */
export type Clock = () => number;
