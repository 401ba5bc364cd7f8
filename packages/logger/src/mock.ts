/** Mock logger for testing */

import { vi, type Mock } from 'vitest';
import type { Logger } from './types.js';

export interface MockLogger extends Logger {
  child: Mock<(metadata: Record<string, unknown>) => MockLogger>;
  debug: Mock<(event_type: string, metadata?: Record<string, unknown>) => void>;
  info: Mock<(event_type: string, metadata?: Record<string, unknown>) => void>;
  warn: Mock<(event_type: string, metadata?: Record<string, unknown>) => void>;
  error: Mock<(event_type: string, metadata?: Record<string, unknown>) => void>;
  fatal: Mock<(event_type: string, metadata?: Record<string, unknown>) => void>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests. `child`
 * returns the same mock, so calls made through child loggers land here too.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@n8nkit/logger/mock';
 *
 * const logger = createMockLogger();
 * const registry = createToolRegistry({ client, logger });
 *
 * await registry.call('get_workflow', { workflow_id: 'wf-1' });
 *
 * expect(logger.info).toHaveBeenCalledWith('tool_call_completed', expect.anything());
 * ```
 */
export function createMockLogger(): MockLogger {
  const mockLogger: MockLogger = {
    child: vi.fn((_metadata: Record<string, unknown>) => mockLogger),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  };

  return mockLogger;
}
