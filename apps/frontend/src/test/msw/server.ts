import { setupServer } from 'msw/node';

/**
 * MSW server for Node/Vitest.
 *
 * Add handlers in individual tests via `server.use(...)` or take the shared
 * ones from `src/test/msw/handlers.ts`.
 */
export const server = setupServer();
