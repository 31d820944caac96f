// Re-export everything
export * from './index';

// Test utilities (below)
export { TestHarness, type TestHarnessOptions, type RecordedEvent } from './test/harness';
export { ManualClock } from './test/manual-clock';
export { RecordingLogger, type LogEntry } from './test/recording-logger';
