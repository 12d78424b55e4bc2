export {
  MembershipConfig,
  defaultConfig,
  defaultLanConfig,
  defaultWanConfig,
  defaultLocalConfig,
  presetConfig,
  membershipConfig,
  DEFAULT_SYNC_INTERVAL,
  DEFAULT_SYNC_TIMEOUT,
  DEFAULT_SUSPICION_MULT,
  DEFAULT_REMOVED_MEMBERS_HISTORY_SIZE,
  DEFAULT_NAMESPACE,
  DEFAULT_WAN_SUSPICION_MULT,
  DEFAULT_WAN_SYNC_INTERVAL,
  DEFAULT_LOCAL_SUSPICION_MULT,
  DEFAULT_LOCAL_SYNC_INTERVAL,
} from './membership/config/MembershipConfig.js';
export type { MembershipConfigOptions } from './membership/config/MembershipConfig.js';
export type { Address } from './membership/config/Address.js';
export { NetworkProfile, isNetworkProfile } from './membership/config/NetworkProfile.js';

export { loadMembershipConfig, MembershipEnv } from './membership/config/MembershipEnv.js';
export type { Env } from './membership/config/MembershipEnv.js';
export {
  MembershipConfigError,
  InvalidProfileError,
  InvalidIntegerSettingError,
} from './membership/config/ConfigError.js';

export { default as logger } from './logger.js';
