/**
 * Control-plane data model
 *
 * Wire shapes exchanged with the RA daemon. Field names are the JSON
 * contract, so they stay snake_case.
 */

// ============================================
// Config (client → daemon)
// ============================================

export interface PrefixConfig {
  /** IPv6 prefix in CIDR notation, e.g. "2001:db8::/64" */
  prefix: string;
  on_link?: boolean;
  autonomous?: boolean;
  valid_lifetime_seconds?: number;
  preferred_lifetime_seconds?: number;
}

export interface InterfaceConfig {
  /** Network interface name. Must be non-empty and unique within a Config. */
  name: string;
  /** Interval between unsolicited advertisements. Must be a positive integer. */
  ra_interval_ms: number;
  hop_limit?: number;
  managed?: boolean;
  other?: boolean;
  router_lifetime_seconds?: number;
  reachable_time_ms?: number;
  retransmit_time_ms?: number;
  mtu?: number;
  prefixes?: PrefixConfig[];
}

export interface Config {
  interfaces: InterfaceConfig[];
}

// ============================================
// Status (daemon → client)
// ============================================

/**
 * Interface lifecycle states the client recognizes out of the box.
 * The daemon owns the full set; extra states are opted into per client.
 */
export const DEFAULT_INTERFACE_STATES = ['Init', 'Running'] as const;

export type KnownInterfaceState = (typeof DEFAULT_INTERFACE_STATES)[number];

/**
 * A recognized state name. Known states keep their literal types;
 * states added through client options are plain strings.
 */
export type InterfaceState = KnownInterfaceState | (string & {});

export interface InterfaceStatus {
  name: string;
  state: InterfaceState;
  /** Daemon-provided detail, typically set for failing interfaces */
  message?: string;
}

export interface Status {
  interfaces: InterfaceStatus[];
}

// ============================================
// Error payload (daemon → client)
// ============================================

export interface ErrorPayload {
  message: string;
  [key: string]: unknown;
}
