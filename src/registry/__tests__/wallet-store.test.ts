/**
 * WalletStore Unit Tests
 *
 * Persistence with atomic writes and backup fallback
 */

import { expect } from 'chai';
import * as fs from 'fs';
import * as path from 'path';
import { T0, newSecret, silenceLogs, tempDir } from '../../__tests__/fakes';
import { WalletRecord } from '../../types';
import { WalletStore } from '../wallet-store';

function record(id: number): WalletRecord {
  return {
    id,
    ...newSecret(),
    encrypted: false,
    proxy: null,
    socials: {},
    referralCode: null,
    inviteCode: null,
    points: 0,
    state: 'idle',
    lastCompletedAt: null,
    nextEligibleAt: null,
    failureCount: 0,
    lastError: null,
    createdAt: T0,
    updatedAt: T0,
  };
}

describe('WalletStore', () => {
  silenceLogs();

  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = tempDir();
    file = path.join(dir, 'wallets.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should persist every mutation and reload it', () => {
    const store = new WalletStore(file).load();
    store.insert(record(1));
    store.update(1, (w) => {
      w.points = 42;
    });

    const reloaded = new WalletStore(file).load();
    expect(reloaded.size).to.equal(1);
    expect(reloaded.getById(1)?.points).to.equal(42);
  });

  it('should start empty without a file', () => {
    expect(new WalletStore(file).load().size).to.equal(0);
  });

  it('should keep at most three backups', () => {
    const store = new WalletStore(file).load();
    for (let id = 1; id <= 5; id++) {
      store.insert(record(id));
    }

    expect(fs.existsSync(`${file}.1`)).to.be.true;
    expect(fs.existsSync(`${file}.2`)).to.be.true;
    expect(fs.existsSync(`${file}.3`)).to.be.true;
    expect(fs.existsSync(`${file}.4`)).to.be.false;
  });

  it('should fall back to the latest backup when the main file is corrupt', () => {
    const store = new WalletStore(file).load();
    store.insert(record(1));
    store.insert(record(2));
    fs.writeFileSync(file, '{ "version": 1, "wallets": [');

    const recovered = new WalletStore(file).load();

    expect(recovered.size).to.equal(1);
    expect(recovered.getById(1)).to.not.be.undefined;
  });

  it('should skip a backup with the wrong shape', () => {
    const store = new WalletStore(file).load();
    store.insert(record(1));
    store.insert(record(2));
    store.insert(record(3));
    fs.writeFileSync(file, 'not json');
    fs.writeFileSync(`${file}.1`, JSON.stringify({ version: 1, wallets: 'nope' }));

    expect(new WalletStore(file).load().size).to.equal(1);
  });

  it('should restore identity fields whatever a mutator does', () => {
    const store = new WalletStore(null);
    const original = record(1);
    store.insert(original);

    store.update(1, (w) => {
      w.id = 99;
      w.address = 'changed';
      w.points = 5;
    });

    const updated = store.getById(1);
    expect(updated?.address).to.equal(original.address);
    expect(updated?.points).to.equal(5);
  });

  it('should hand out copies', () => {
    const store = new WalletStore(null);
    store.insert(record(1));

    const copy = store.getById(1);
    if (copy) copy.points = 100;

    expect(store.getById(1)?.points).to.equal(0);
  });
});
