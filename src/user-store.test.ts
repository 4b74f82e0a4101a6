import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createCore, type Core } from './test-utils';

describe('UserStore', () => {
  let core: Core;

  beforeEach(() => {
    core = createCore();
  });

  afterEach(() => {
    core.db.close();
  });

  it('creates a user once and keeps known names', () => {
    const created = core.users.touch({ telegramId: 11, username: 'bob', firstName: 'Bob' });
    const again = core.users.touch({ telegramId: 11 });

    expect(again.id).toBe(created.id);
    expect(again).toMatchObject({ username: 'bob', firstName: 'Bob', subscriptionUntil: null, isActive: true });
    expect(core.users.touch({ telegramId: 11, username: 'bobby' }).username).toBe('bobby');
    expect(core.users.count()).toBe(1);
  });

  it('looks users up by telegram id', () => {
    const user = core.users.touch({ telegramId: 12 });

    expect(core.users.get(12)?.id).toBe(user.id);
    expect(core.users.get(999)).toBeNull();
    expect(() => core.users.requireByTelegramId(999)).toThrow('User 999 not found');
  });

  it('blocks and unblocks', () => {
    core.users.touch({ telegramId: 13 });

    expect(core.users.setActive(13, false).isActive).toBe(false);
    expect(core.users.get(13)?.isActive).toBe(false);
    expect(core.users.setActive(13, true).isActive).toBe(true);
  });

  it('counts only users with a window still open', () => {
    core.users.touch({ telegramId: 14 });
    core.users.touch({ telegramId: 15 });
    core.ledger.adminGrant(14, 1);
    core.ledger.adminGrant(15, 3);
    core.clock.advanceDays(2);

    expect(core.users.countEntitled(core.clock.now())).toBe(1);
  });

  it('skips blocked users when collecting lapsed windows', () => {
    core.users.touch({ telegramId: 16 });
    core.users.touch({ telegramId: 17 });
    core.ledger.adminGrant(16, 1);
    core.ledger.adminGrant(17, 1);
    core.users.setActive(17, false);
    core.clock.advanceDays(1);

    expect(core.users.listNewlyExpired(core.clock.now()).map((u) => u.telegramId)).toEqual([16]);
  });

  it('reuses statements prepared up front', () => {
    core.users.touch({ telegramId: 18 });
    const prepare = vi.spyOn(core.db, 'prepare');

    core.users.touch({ telegramId: 18 });
    core.users.listRecent(5);
    core.users.countEntitled(core.clock.now());
    core.directory.listAll();
    core.payments.stats(core.clock.now());
    core.registry.listConfigs(18);

    expect(prepare).not.toHaveBeenCalled();
    prepare.mockRestore();
  });
});
