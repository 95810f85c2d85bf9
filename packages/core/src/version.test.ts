import { describe, expect, it } from 'vitest';

import { CORE_VERSION, REGISTRY_SNAPSHOT_SCHEMA_VERSION } from './version.js';

describe('version constants', () => {
  it('follows semver format', () => {
    expect(CORE_VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it('keeps the registry snapshot schema at version 1', () => {
    // Bump alongside a migration when the snapshot format changes.
    expect(REGISTRY_SNAPSHOT_SCHEMA_VERSION).toBe(1);
  });
});
