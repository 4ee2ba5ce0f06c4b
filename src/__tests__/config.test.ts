/**
 * Configuration Unit Tests
 */

import { expect } from 'chai';
import * as fs from 'fs';
import * as path from 'path';
import { describeEnv, loadEnv, loadSettings, parseSettings, resolvePaths } from '../config';
import { ConfigError } from '../utils/errors';
import { tempDir } from './fakes';

describe('config', () => {
  describe('parseSettings', () => {
    it('should fill defaults for an empty document', () => {
      const config = parseSettings({});

      expect(config.threads).to.equal(1);
      expect(config.encryption).to.be.true;
      expect(config.selection).to.deep.equal({ range: null, exact: [] });
      expect(config.pacingSeconds).to.deep.equal({ min: 5, max: 60 });
      expect(config.logLevel).to.equal('info');
      expect(config.actionTimeoutMs).to.equal(300_000);
      expect(config.enabledActions.ai_dialog).to.be.true;
      expect(config.enabledActions.social).to.be.false;
      expect(config.enabledActions.staking).to.be.false;
      expect(config.shuffleWallets).to.be.false;
      expect(config.stakeAmount).to.deep.equal({ min: 1, max: 5 });
      expect(config.stakingSubnets).to.deep.equal([]);
    });

    it('should map settings names onto RunConfig', () => {
      const config = parseSettings({
        threads: 4,
        range_wallets_to_run: [2, 6],
        exact_wallets_to_run: [8, 1, 3, 3],
        log_level: 'WARNING',
        random_pause_wallet_after_completion: { min: 60, max: 120 },
        rescan_interval_seconds: 30,
        actions: { bridge: false, staking: true },
        shuffle_wallets: true,
        staking_subnets: ['subnet-a'],
      });

      expect(config.threads).to.equal(4);
      expect(config.selection.range).to.deep.equal([2, 6]);
      expect(config.selection.exact).to.deep.equal([1, 3, 8]);
      expect(config.logLevel).to.equal('warn');
      expect(config.cooldownSeconds).to.deep.equal({ min: 60, max: 120 });
      expect(config.rescanIntervalMs).to.equal(30_000);
      expect(config.enabledActions.bridge).to.be.false;
      expect(config.enabledActions.swap).to.be.true;
      expect(config.enabledActions.staking).to.be.true;
      expect(config.shuffleWallets).to.be.true;
      expect(config.stakingSubnets).to.deep.equal(['subnet-a']);
    });

    it('should deep-freeze the result', () => {
      const config = parseSettings({});
      expect(Object.isFrozen(config)).to.be.true;
      expect(Object.isFrozen(config.selection)).to.be.true;
      expect(Object.isFrozen(config.cooldownSeconds)).to.be.true;
    });

    it('should ignore unknown keys', () => {
      expect(parseSettings({ legacy_option: true }).threads).to.equal(1);
    });

    it('should reject invalid values with every offending path', () => {
      try {
        parseSettings({ threads: 0, random_pause_between_actions: { min: 10, max: 5 } });
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).to.be.instanceOf(ConfigError);
        expect(error).to.have.property('issues').with.lengthOf(2);
        expect(error).to.have.property('message').that.includes('threads:');
        expect(error).to.have.property('message').that.includes('random_pause_between_actions: min must not exceed max');
      }
    });

    it('should reject a half-open range', () => {
      expect(() => parseSettings({ range_wallets_to_run: [0, 5] })).to.throw(ConfigError);
    });
  });

  describe('loadSettings', () => {
    let dir: string;

    beforeEach(() => {
      dir = tempDir();
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should write defaults when the file is missing', () => {
      const file = path.join(dir, 'settings.json');

      const config = loadSettings(file);

      expect(config.threads).to.equal(1);
      const written = JSON.parse(fs.readFileSync(file, 'utf-8'));
      expect(written.threads).to.equal(1);
      expect(written.range_wallets_to_run).to.deep.equal([0, 0]);
    });

    it('should raise ConfigError for malformed JSON', () => {
      const file = path.join(dir, 'settings.json');
      fs.writeFileSync(file, '{ threads: 2');
      expect(() => loadSettings(file)).to.throw(ConfigError, 'Settings file is not valid JSON');
    });
  });

  describe('environment', () => {
    it('should apply defaults and resolve data paths', () => {
      const env = loadEnv({ FARMHAND_DATA_DIR: '/srv/farm' });
      const paths = resolvePaths(env);

      expect(env.RPC_URL).to.equal('https://api.devnet.solana.com');
      expect(paths.store).to.equal(path.join('/srv/farm', 'wallets.json'));
      expect(paths.settings).to.equal(path.join('/srv/farm', 'settings.json'));
      expect(paths.reserveProxies).to.equal(path.join('/srv/farm', 'reserve_proxy.txt'));
    });

    it('should reject malformed URLs', () => {
      expect(() => loadEnv({ RPC_URL: 'not-a-url' })).to.throw(ConfigError, 'RPC_URL');
    });

    it('should redact the password when described', () => {
      const env = loadEnv({ FARMHAND_PASSWORD: 'test-secret' });
      expect(describeEnv(env).FARMHAND_PASSWORD).to.equal('***REDACTED***');
    });
  });
});
