export const NetworkProfile = {
  LAN: 'lan',
  WAN: 'wan',
  LOCAL: 'local',
} as const;

export type NetworkProfile = (typeof NetworkProfile)[keyof typeof NetworkProfile];

export function isNetworkProfile(x: unknown): x is NetworkProfile {
  return x === NetworkProfile.LAN || x === NetworkProfile.WAN || x === NetworkProfile.LOCAL;
}
