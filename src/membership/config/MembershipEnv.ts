import logger from '../../logger.js';
import { InvalidIntegerSettingError, InvalidProfileError } from './ConfigError.js';
import { membershipConfig, presetConfig, type MembershipConfig } from './MembershipConfig.js';
import { NetworkProfile, isNetworkProfile } from './NetworkProfile.js';

export type Env = Record<string, string | undefined>;

export const MembershipEnv = {
  PROFILE: 'MEMBERSHIP_PROFILE',
  SEED_MEMBERS: 'MEMBERSHIP_SEED_MEMBERS',
  SYNC_INTERVAL: 'MEMBERSHIP_SYNC_INTERVAL',
  SYNC_TIMEOUT: 'MEMBERSHIP_SYNC_TIMEOUT',
  SUSPICION_MULT: 'MEMBERSHIP_SUSPICION_MULT',
  REMOVED_MEMBERS_HISTORY_SIZE: 'MEMBERSHIP_REMOVED_MEMBERS_HISTORY_SIZE',
  NAMESPACE: 'MEMBERSHIP_NAMESPACE',
} as const;

// unset and blank are treated alike
function readString(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? undefined : raw;
}

function readInteger(env: Env, name: string): number | undefined {
  const raw = readString(env, name);
  if (raw === undefined) return undefined;
  const text = raw.trim();
  if (!/^-?\d+$/.test(text)) throw new InvalidIntegerSettingError(name, raw);
  const value = Number.parseInt(text, 10);
  if (!Number.isSafeInteger(value)) throw new InvalidIntegerSettingError(name, raw);
  return value;
}

// taken verbatim; only an unset or empty variable keeps the preset
function readVerbatim(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw === '' ? undefined : raw;
}

function readList(env: Env, name: string): string[] | undefined {
  const raw = readString(env, name);
  if (raw === undefined) return undefined;
  return raw.split(',').map((s) => s.trim()).filter(Boolean);
}

function readProfile(env: Env): NetworkProfile {
  const raw = readString(env, MembershipEnv.PROFILE);
  if (raw === undefined) return NetworkProfile.LAN;
  const name = raw.trim().toLowerCase();
  if (!isNetworkProfile(name)) {
    throw new InvalidProfileError(MembershipEnv.PROFILE, raw, Object.values(NetworkProfile));
  }
  return name;
}

/**
 * Builds a config from `MEMBERSHIP_*` variables on top of the preset named by
 * `MEMBERSHIP_PROFILE` (LAN when unset). Integer settings must be integers;
 * their range is left to the protocol engine.
 */
export function loadMembershipConfig(env: Env = process.env): MembershipConfig {
  const profile = readProfile(env);
  const config = membershipConfig(
    {
      seedMembers: readList(env, MembershipEnv.SEED_MEMBERS),
      syncInterval: readInteger(env, MembershipEnv.SYNC_INTERVAL),
      syncTimeout: readInteger(env, MembershipEnv.SYNC_TIMEOUT),
      suspicionMult: readInteger(env, MembershipEnv.SUSPICION_MULT),
      removedMembersHistorySize: readInteger(env, MembershipEnv.REMOVED_MEMBERS_HISTORY_SIZE),
      namespace: readVerbatim(env, MembershipEnv.NAMESPACE),
    },
    presetConfig(profile)
  );
  logger.debug('membership config loaded', { profile, ...config.toJSON() });
  return config;
}
