import { BackendRegistry } from './backend.registry';
import type { BackendAdapter } from './backend.types';
import { BackendNotRegisteredError } from '../errors';

const adapter = (kind: BackendAdapter['kind']): BackendAdapter => ({
  kind,
  submit: jest.fn(),
});

describe('BackendRegistry', () => {
  const settings = {
    transcoder: { enabled: true, timeoutBaseMs: 1, timeoutCeilingMs: 2 },
    editor: { enabled: false, timeoutBaseMs: 1, timeoutCeilingMs: 2, maxConcurrency: 1 },
    upscaler: { enabled: true, timeoutBaseMs: 1, timeoutCeilingMs: 2, maxConcurrency: 1 },
  };

  it('should only register enabled backends', () => {
    const registry = new BackendRegistry(
      [adapter('transcoder'), adapter('editor'), adapter('upscaler')],
      settings,
    );

    expect(registry.enabledKinds()).toEqual([
      { kind: 'transcoder', maxConcurrency: undefined },
      { kind: 'upscaler', maxConcurrency: 1 },
    ]);
    expect(registry.get('upscaler').kind).toBe('upscaler');
    expect(() => registry.get('editor')).toThrow(BackendNotRegisteredError);
  });
});
