// Test setup file for Vitest

import { vi } from 'vitest';

// Keep expected error logging out of the test output
vi.spyOn(console, 'error').mockImplementation(() => {});
