import { getLogger } from '../utils/get-logger';

describe('getLogger', () => {
  it('returns one shared logger', () => {
    expect(getLogger()).toBe(getLogger());
  });

  it('binds the component on child loggers without opening new output streams', () => {
    getLogger();
    const listenersBefore = process.stderr.listenerCount('close');

    const children = ['tree-walker', 'fingerprint', 'duplicate-detector'].map((component) => getLogger(component));

    expect(process.stderr.listenerCount('close')).toBe(listenersBefore);
    expect(children[0]?.bindings()).toMatchObject({ component: 'tree-walker' });
  });
});
