import { vi } from 'vitest';

// Tests never launch a real tor binary
vi.mock('execa', () => ({
    execa: vi.fn(() => {
        throw new Error('tor is not available in tests');
    }),
}));

delete process.env.FOSINT_DEBUG;
delete process.env.FOSINT_HOME;
