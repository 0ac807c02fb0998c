/**
 * Jest setup: let unmounted Ink views and closed fork log streams settle
 * before the worker exits.
 */

import { afterAll } from '@jest/globals';

// Ink 3 only writes the last frame on unmount under CI, which leaves
// ink-testing-library's frames blank; render as on a terminal instead.
process.env.CI = 'false';

afterAll(() => new Promise<void>((resolve) => setTimeout(resolve, 50)));
