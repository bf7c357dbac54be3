import { afterEach, vi } from 'vitest';
import { GpuCache } from './gpu/gpu-cache';

afterEach(() => {
  vi.restoreAllMocks();
  GpuCache.clear();
});
