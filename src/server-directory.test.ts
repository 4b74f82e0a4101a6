import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseServerEndpoint } from './server-directory';
import { createCore, type Core } from './test-utils';

describe('parseServerEndpoint', () => {
  it('defaults the port to 443', () => {
    expect(parseServerEndpoint('b.com')).toEqual({ address: 'b.com', port: 443 });
  });

  it('reads an explicit port', () => {
    expect(parseServerEndpoint(' a.com:8443 ')).toEqual({ address: 'a.com', port: 8443 });
  });

  it('takes IPv6 only in brackets', () => {
    expect(parseServerEndpoint('[2001:db8::1]:8443')).toEqual({ address: '[2001:db8::1]', port: 8443 });
    expect(parseServerEndpoint('[::1]')).toEqual({ address: '[::1]', port: 443 });
  });

  it.each(['', 'a.com:', 'a.com:http', 'a.com:70000', ':443', '::1', '2001:db8::1:443', '[]:443', '[::1]x', '[::1'])(
    'rejects "%s"',
    (value) => {
      expect(parseServerEndpoint(value)).toBeNull();
    },
  );
});

describe('ServerDirectory', () => {
  let core: Core;

  beforeEach(() => {
    core = createCore();
  });

  afterEach(() => {
    core.db.close();
  });

  describe('seedFromConfig', () => {
    it('fills an empty catalog and is a no-op afterwards', () => {
      expect(core.directory.seedFromConfig(['a.com:443', 'b.com'])).toBe(2);

      const seeded = core.directory.listAll();
      expect(seeded.map((s) => [s.address, s.port, s.description, s.isActive])).toEqual([
        ['a.com', 443, 'Server a.com', true],
        ['b.com', 443, 'Server b.com', true],
      ]);

      expect(core.directory.seedFromConfig(['c.com:8080'])).toBe(0);
      expect(core.directory.listAll()).toEqual(seeded);
    });

    it('does nothing when the catalog holds only inactive servers', () => {
      const added = core.directory.add('old.com', 443);
      if (!added.ok) throw new Error('setup failed');
      core.directory.setActive(added.value.id, false);

      expect(core.directory.seedFromConfig(['a.com'])).toBe(0);
      expect(core.directory.listActive()).toEqual([]);
    });

    it('skips malformed and repeated entries', () => {
      expect(core.directory.seedFromConfig(['a.com', 'bad:port', 'a.com:8443'])).toBe(1);
      expect(core.directory.listAll().map((s) => s.address)).toEqual(['a.com']);
    });
  });

  describe('add', () => {
    it('stores the server with defaults', () => {
      const result = core.directory.add('minimal.com', 443);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toMatchObject({
        address: 'minimal.com',
        port: 443,
        description: 'Server minimal.com',
        location: null,
        maxUsers: 1000,
        isActive: true,
      });
    });

    it('keeps a custom description', () => {
      const result = core.directory.add('proxy.new.com', 8080, 'New Test Server');
      expect(result.ok && result.value.description).toBe('New Test Server');
    });

    it('rejects an address that exists, even when deactivated', () => {
      const first = core.directory.add('existing.com', 443);
      if (!first.ok) throw new Error('setup failed');
      core.directory.setActive(first.value.id, false);

      expect(core.directory.add('existing.com', 8080)).toEqual({ ok: false, error: 'DUPLICATE_ADDRESS' });
      expect(core.directory.count()).toBe(1);
    });
  });

  describe('setActive', () => {
    it('hides a server from listActive without deleting it', () => {
      core.directory.seedFromConfig(['a.com', 'b.com', 'c.com']);
      const [, b] = core.directory.listAll();

      const updated = core.directory.setActive(b.id, false);

      expect(updated.isActive).toBe(false);
      expect(core.directory.listActive().map((s) => s.address)).toEqual(['a.com', 'c.com']);
      expect(core.directory.countActive()).toBe(2);
      expect(core.directory.count()).toBe(3);

      core.directory.setActive(b.id, true);
      expect(core.directory.listActive().map((s) => s.address)).toEqual(['a.com', 'b.com', 'c.com']);
    });

    it('leaves credentials issued against the server in place', () => {
      core.directory.seedFromConfig(['a.com']);
      core.users.touch({ telegramId: 7 });
      core.ledger.adminGrant(7, 30);
      core.registry.ensureConfigs(7, core.directory.listActive());

      core.directory.setActive(core.directory.listAll()[0].id, false);

      expect(core.registry.listConfigs(7).map((c) => c.serverAddress)).toEqual(['a.com']);
    });

    it('throws NOT_FOUND for an unknown id', () => {
      expect(() => core.directory.setActive(42, false)).toThrow('Server 42 not found');
    });
  });
});
