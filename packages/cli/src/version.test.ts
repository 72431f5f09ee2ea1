import { readVersion } from './version';

describe('readVersion', () => {
  it('reads the version from the package manifest', () => {
    expect(readVersion()).toBe('0.1.0');
  });
});
