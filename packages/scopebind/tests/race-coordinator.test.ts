import { describe, expect, it } from 'vitest';

import { keyOf } from '../src/core/key.js';
import { Locator } from '../src/core/locator.js';
import { coordinatorFor, RaceCoordinator } from '../src/core/race-coordinator.js';
import { ScopeRecorder } from '../src/core/scope-recorder.js';
import { token } from '../src/core/token.js';
import { createLogger } from './helpers.js';

const emptyRegistry = { exists: () => false };

describe('RaceCoordinator', () => {
  it('makes the first caller the creator and later callers borrowers', () => {
    const races = new RaceCoordinator();
    const key = keyOf(token('Db'));

    const first = races.beginInstall(key, emptyRegistry);
    const second = races.beginInstall(key, emptyRegistry);

    expect(first.isCreator).toBe(true);
    expect(second.isCreator).toBe(false);
    if (!second.isCreator) expect(second.wait).toBeInstanceOf(Promise);
    expect(races.isInFlight(key)).toBe(true);
    expect(races.size).toBe(1);
  });

  it('hands out no wait when the key is already registered', () => {
    const races = new RaceCoordinator();
    const ticket = races.beginInstall(keyOf(token('Db')), { exists: () => true });

    expect(ticket).toEqual({ isCreator: false });
    expect(races.size).toBe(0);
  });

  it('wakes borrowers when the creator releases', async () => {
    const races = new RaceCoordinator();
    const key = keyOf(token('Db'));
    const creator = races.beginInstall(key, emptyRegistry);
    const borrower = races.beginInstall(key, emptyRegistry);

    let woke = false;
    if (!borrower.isCreator) {
      void borrower.wait?.then(() => {
        woke = true;
      });
    }
    if (creator.isCreator) creator.release();
    await Promise.resolve();

    expect(woke).toBe(true);
    expect(races.isInFlight(key)).toBe(false);
  });

  it('ignores a second release and lets the next caller create again', () => {
    const races = new RaceCoordinator();
    const key = keyOf(token('Db'));
    const first = races.beginInstall(key, emptyRegistry);
    if (first.isCreator) first.release();

    const second = races.beginInstall(key, emptyRegistry);
    expect(second.isCreator).toBe(true);

    // A stale release must not clear the new install's marker
    if (first.isCreator) first.release();
    expect(races.isInFlight(key)).toBe(true);
  });

  it('keeps installs of different keys independent', () => {
    const races = new RaceCoordinator();
    const DbT = token('Db');

    expect(races.beginInstall(keyOf(DbT), emptyRegistry).isCreator).toBe(true);
    expect(races.beginInstall(keyOf(DbT, 'replica'), emptyRegistry).isCreator).toBe(true);
    expect(races.size).toBe(2);
  });

  it('treats endInstall on an idle key as a no-op', () => {
    const races = new RaceCoordinator();
    expect(() => races.endInstall(keyOf(token('Idle')))).not.toThrow();
  });

  it('remembers which scope owns an install', () => {
    const races = new RaceCoordinator();
    const owner = new ScopeRecorder('Owner', { logger: createLogger() });
    const scoped = keyOf(token('Scoped'));
    const unscoped = keyOf(token('Unscoped'));

    races.beginInstall(scoped, emptyRegistry, owner);
    races.beginInstall(unscoped, emptyRegistry);

    expect(races.ownerOf(scoped)).toBe(owner);
    expect(races.ownerOf(unscoped)).toBeUndefined();
    expect(races.isInFlight(unscoped)).toBe(true);
  });

  it('hands out one coordinator per registry', () => {
    const shared = new Locator({ logger: createLogger() });
    const other = new Locator({ logger: createLogger() });

    expect(coordinatorFor(shared)).toBe(coordinatorFor(shared));
    expect(coordinatorFor(other)).not.toBe(coordinatorFor(shared));
  });
});
