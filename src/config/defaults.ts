import type { Config } from './validator';

export const defaults: Config = {
  system: {
    profile: '/nix/var/nix/profiles/system',
    configurationFile: '/etc/nixos/configuration.nix',
  },
  native: {
    enabled: true,
    searchPaths: ['/run/current-system/sw/lib/node_modules/nixos-rebuild-native', '/usr/local/lib/node_modules/nixos-rebuild-native'],
    allowUnprivileged: false,
    maxQueuedCalls: 4,
  },
  fallback: {
    enabled: true,
    timeoutMs: 600_000,
    useSudo: true,
  },
  logging: {
    level: 'info',
  },
};
