import type { Address } from './Address.js';
import { NetworkProfile } from './NetworkProfile.js';

// LAN defaults
export const DEFAULT_SYNC_INTERVAL = 30_000;
export const DEFAULT_SYNC_TIMEOUT = 3_000;
export const DEFAULT_SUSPICION_MULT = 5;
export const DEFAULT_REMOVED_MEMBERS_HISTORY_SIZE = 42;
export const DEFAULT_NAMESPACE = 'default';

// WAN overrides
export const DEFAULT_WAN_SUSPICION_MULT = 6;
export const DEFAULT_WAN_SYNC_INTERVAL = 60_000;

// Loopback overrides
export const DEFAULT_LOCAL_SUSPICION_MULT = 3;
export const DEFAULT_LOCAL_SYNC_INTERVAL = 15_000;

export type MembershipConfigOptions = {
  seedMembers: readonly Address[];
  syncInterval: number;
  syncTimeout: number;
  suspicionMult: number;
  removedMembersHistorySize: number;
  namespace: string;
};

const defaultOptions: MembershipConfigOptions = {
  seedMembers: Object.freeze([]),
  syncInterval: DEFAULT_SYNC_INTERVAL,
  syncTimeout: DEFAULT_SYNC_TIMEOUT,
  suspicionMult: DEFAULT_SUSPICION_MULT,
  removedMembersHistorySize: DEFAULT_REMOVED_MEMBERS_HISTORY_SIZE,
  namespace: DEFAULT_NAMESPACE,
};

/**
 * Tuning parameters of the gossip membership protocol.
 *
 * Instances are frozen. Every `with*` method returns a new config that
 * differs from the receiver in that one field. Values are not checked
 * here; the protocol engine reading them rejects what it cannot use.
 */
export class MembershipConfig {
  readonly seedMembers: readonly Address[];
  readonly syncInterval: number;
  readonly syncTimeout: number;
  // multiplies the base interval into the suspicion timeout
  readonly suspicionMult: number;
  readonly removedMembersHistorySize: number;
  readonly namespace: string;

  constructor(options: MembershipConfigOptions = defaultOptions) {
    // a frozen list cannot change under us, so it is shared rather than copied
    this.seedMembers = Object.isFrozen(options.seedMembers)
      ? options.seedMembers
      : Object.freeze([...options.seedMembers]);
    this.syncInterval = options.syncInterval;
    this.syncTimeout = options.syncTimeout;
    this.suspicionMult = options.suspicionMult;
    this.removedMembersHistorySize = options.removedMembersHistorySize;
    this.namespace = options.namespace;
    Object.freeze(this);
  }

  withSeedMembers(seedMembers: readonly Address[]): MembershipConfig;
  withSeedMembers(...seedMembers: Address[]): MembershipConfig;
  withSeedMembers(...args: Array<Address | readonly Address[]>): MembershipConfig {
    return this.with({ seedMembers: args.flatMap((a) => a) });
  }

  withSyncInterval(syncInterval: number): MembershipConfig {
    return this.with({ syncInterval });
  }

  withSyncTimeout(syncTimeout: number): MembershipConfig {
    return this.with({ syncTimeout });
  }

  withSuspicionMult(suspicionMult: number): MembershipConfig {
    return this.with({ suspicionMult });
  }

  withRemovedMembersHistorySize(removedMembersHistorySize: number): MembershipConfig {
    return this.with({ removedMembersHistorySize });
  }

  withNamespace(namespace: string): MembershipConfig {
    return this.with({ namespace });
  }

  equals(other: MembershipConfig): boolean {
    if (this === other) return true;
    return (
      this.syncInterval === other.syncInterval &&
      this.syncTimeout === other.syncTimeout &&
      this.suspicionMult === other.suspicionMult &&
      this.removedMembersHistorySize === other.removedMembersHistorySize &&
      this.namespace === other.namespace &&
      this.seedMembers.length === other.seedMembers.length &&
      this.seedMembers.every((address, i) => address === other.seedMembers[i])
    );
  }

  toJSON(): MembershipConfigOptions {
    return { ...this.options(), seedMembers: [...this.seedMembers] };
  }

  toString(): string {
    const fields = [
      `seedMembers=[${this.seedMembers.join(', ')}]`,
      `syncInterval=${this.syncInterval}`,
      `syncTimeout=${this.syncTimeout}`,
      `suspicionMult=${this.suspicionMult}`,
      `namespace='${this.namespace}'`,
      `removedMembersHistorySize=${this.removedMembersHistorySize}`,
    ];
    return `MembershipConfig[${fields.join(', ')}]`;
  }

  private options(): MembershipConfigOptions {
    return {
      seedMembers: this.seedMembers,
      syncInterval: this.syncInterval,
      syncTimeout: this.syncTimeout,
      suspicionMult: this.suspicionMult,
      removedMembersHistorySize: this.removedMembersHistorySize,
      namespace: this.namespace,
    };
  }

  private with(patch: Partial<MembershipConfigOptions>): MembershipConfig {
    return new MembershipConfig({ ...this.options(), ...patch });
  }
}

export function defaultConfig(): MembershipConfig {
  return new MembershipConfig();
}

// defaults are LAN-tuned
export function defaultLanConfig(): MembershipConfig {
  return defaultConfig();
}

export function defaultWanConfig(): MembershipConfig {
  return defaultConfig()
    .withSuspicionMult(DEFAULT_WAN_SUSPICION_MULT)
    .withSyncInterval(DEFAULT_WAN_SYNC_INTERVAL);
}

export function defaultLocalConfig(): MembershipConfig {
  return defaultConfig()
    .withSuspicionMult(DEFAULT_LOCAL_SUSPICION_MULT)
    .withSyncInterval(DEFAULT_LOCAL_SYNC_INTERVAL);
}

export function presetConfig(profile: NetworkProfile): MembershipConfig {
  switch (profile) {
    case NetworkProfile.LAN:
      return defaultLanConfig();
    case NetworkProfile.WAN:
      return defaultWanConfig();
    case NetworkProfile.LOCAL:
      return defaultLocalConfig();
  }
}

/** Overlays the given options on `base`; keys left undefined keep the base value. */
export function membershipConfig(
  options: Partial<MembershipConfigOptions> = {},
  base: MembershipConfig = defaultConfig()
): MembershipConfig {
  return new MembershipConfig({
    seedMembers: options.seedMembers ?? base.seedMembers,
    syncInterval: options.syncInterval ?? base.syncInterval,
    syncTimeout: options.syncTimeout ?? base.syncTimeout,
    suspicionMult: options.suspicionMult ?? base.suspicionMult,
    removedMembersHistorySize: options.removedMembersHistorySize ?? base.removedMembersHistorySize,
    namespace: options.namespace ?? base.namespace,
  });
}
