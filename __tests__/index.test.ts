import * as main from '@/main';
import { describe, expect, it, vi } from 'vitest';

// Keep the entry point from running a real command
vi.spyOn(main, 'run').mockResolvedValue();

describe('index', () => {
  it('should start the action once when the bundle is loaded', async () => {
    await import('@/index');
    expect(main.run).toHaveBeenCalledOnce();
  });
});
