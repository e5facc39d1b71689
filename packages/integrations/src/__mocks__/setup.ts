/**
 * MSW Test Utilities
 *
 * Lifecycle management (beforeAll/afterEach/afterAll) is handled by
 * vitest.setup.ts. Test files import the server from here to add per-test
 * handlers:
 * ```typescript
 * server.use(
 *   http.post(ANTHROPIC_MESSAGES_URL, () => HttpResponse.json({ content: [] }))
 * );
 * ```
 */

export { server } from './server.js';
export {
  handlers,
  testFixtures,
  ANTHROPIC_MESSAGES_URL,
  createRateLimitedHandler,
  createFailingHandler,
} from './handlers.js';
