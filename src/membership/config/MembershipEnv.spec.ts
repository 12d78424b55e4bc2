import test from 'node:test';
import assert from 'node:assert/strict';
import { once } from 'node:events';
import { PassThrough } from 'node:stream';
import winston from 'winston';
import logger from '../../logger.js';
import { loadMembershipConfig } from './MembershipEnv.js';
import {
  defaultLanConfig,
  defaultLocalConfig,
  defaultWanConfig,
} from './MembershipConfig.js';
import {
  InvalidIntegerSettingError,
  InvalidProfileError,
  MembershipConfigError,
} from './ConfigError.js';

test('empty environment yields the LAN preset', () => {
  assert.equal(loadMembershipConfig({}).equals(defaultLanConfig()), true);
});

test('blank variables are ignored', () => {
  const c = loadMembershipConfig({ MEMBERSHIP_PROFILE: ' ', MEMBERSHIP_SYNC_INTERVAL: '' });
  assert.equal(c.equals(defaultLanConfig()), true);
});

test('profile selects the base preset, case-insensitively', () => {
  assert.equal(loadMembershipConfig({ MEMBERSHIP_PROFILE: 'wan' }).equals(defaultWanConfig()), true);
  assert.equal(loadMembershipConfig({ MEMBERSHIP_PROFILE: ' Local ' }).equals(defaultLocalConfig()), true);
});

test('settings override the preset', () => {
  const c = loadMembershipConfig({
    MEMBERSHIP_PROFILE: 'wan',
    MEMBERSHIP_SEED_MEMBERS: '10.0.0.1:4801, 10.0.0.2:4801,,10.0.0.1:4801',
    MEMBERSHIP_SYNC_TIMEOUT: ' 2500 ',
    MEMBERSHIP_REMOVED_MEMBERS_HISTORY_SIZE: '100',
    MEMBERSHIP_NAMESPACE: 'orders',
  });
  assert.deepEqual(c.toJSON(), {
    seedMembers: ['10.0.0.1:4801', '10.0.0.2:4801', '10.0.0.1:4801'],
    syncInterval: 60000,
    syncTimeout: 2500,
    suspicionMult: 6,
    removedMembersHistorySize: 100,
    namespace: 'orders',
  });
});

test('namespace is taken verbatim unless empty', () => {
  assert.equal(loadMembershipConfig({ MEMBERSHIP_NAMESPACE: '  ' }).namespace, '  ');
  assert.equal(loadMembershipConfig({ MEMBERSHIP_NAMESPACE: ' blue ' }).namespace, ' blue ');
  assert.equal(loadMembershipConfig({ MEMBERSHIP_NAMESPACE: '' }).namespace, 'default');
});

test('largest safe integer is accepted', () => {
  const c = loadMembershipConfig({ MEMBERSHIP_SYNC_INTERVAL: '9007199254740991' });
  assert.equal(c.syncInterval, Number.MAX_SAFE_INTEGER);
});

test('loaded config is logged at debug level', async () => {
  const sink = new PassThrough({ objectMode: true });
  const transport = new winston.transports.Stream({ stream: sink });
  const level = logger.level;
  logger.level = 'debug';
  logger.add(transport);
  try {
    const received = once(sink, 'data');
    loadMembershipConfig({ MEMBERSHIP_PROFILE: 'local', MEMBERSHIP_SEED_MEMBERS: 'a:1,b:2' });
    const [info] = await received;
    assert.equal(info.level, 'debug');
    assert.equal(info.message, 'membership config loaded');
    assert.equal(info.profile, 'local');
    assert.deepEqual(info.seedMembers, ['a:1', 'b:2']);
    assert.equal(info.syncInterval, 15000);
  } finally {
    logger.remove(transport);
    logger.level = level;
  }
});

test('integer settings pass through zero and negatives', () => {
  const c = loadMembershipConfig({ MEMBERSHIP_SYNC_INTERVAL: '0', MEMBERSHIP_SUSPICION_MULT: '-2' });
  assert.equal(c.syncInterval, 0);
  assert.equal(c.suspicionMult, -2);
});

test('unknown profile is rejected', () => {
  assert.throws(
    () => loadMembershipConfig({ MEMBERSHIP_PROFILE: 'mars' }),
    (err: unknown) => {
      assert.ok(err instanceof InvalidProfileError);
      assert.ok(err instanceof MembershipConfigError);
      assert.equal(err.name, 'InvalidProfileError');
      assert.equal(err.variable, 'MEMBERSHIP_PROFILE');
      assert.equal(err.value, 'mars');
      assert.equal(
        err.message,
        'MEMBERSHIP_PROFILE="mars" is not a known profile. Expected one of: lan, wan, local.'
      );
      return true;
    }
  );
});

test('non-integer setting is rejected', () => {
  for (const value of ['1.5', '30s', '1e3', '9007199254740993']) {
    assert.throws(
      () => loadMembershipConfig({ MEMBERSHIP_SYNC_TIMEOUT: value }),
      (err: unknown) => {
        assert.ok(err instanceof InvalidIntegerSettingError);
        assert.equal(err.variable, 'MEMBERSHIP_SYNC_TIMEOUT');
        assert.equal(err.value, value);
        assert.equal(err.message, `MEMBERSHIP_SYNC_TIMEOUT="${value}" is not an integer.`);
        return true;
      }
    );
  }
});
