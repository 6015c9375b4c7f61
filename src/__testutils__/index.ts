/**
 * Test utilities - Re-export all test helpers
 *
 * Single import point for all test utilities:
 * ```ts
 * import { FakeExecutor, MockMpvServer, useFakeClock } from '@/__testutils__/index.js';
 * ```
 */

export { FakeClock } from './FakeClock.js';
export { FakeExecutor, type Responder } from './FakeExecutor.js';
export { MockMpvServer } from './MockMpvServer.js';
export { useFakeClock, type ClockHelper } from './testClock.js';
export { waitFor } from './waitFor.js';
