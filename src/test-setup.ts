/**
 * Global test setup file for Vitest.
 *
 * Silences the structured logger's console output and blocks real network calls.
 */

import { vi } from 'vitest';

const blockedFetch = () => Promise.reject(new Error('Test mock: Network request not allowed'));

globalThis.fetch = blockedFetch;

vi.spyOn(console, 'debug').mockImplementation(() => {});
vi.spyOn(console, 'info').mockImplementation(() => {});
vi.spyOn(console, 'warn').mockImplementation(() => {});
vi.spyOn(console, 'error').mockImplementation(() => {});
