export const CONNECTION_STATES = [
  "disconnected",
  "authenticating",
  "authenticated",
  "refreshing_credentials",
  "rate_limited",
  "circuit_open",
  "error",
] as const;

export type ConnectionState = (typeof CONNECTION_STATES)[number];

export const CONNECTION_EVENTS = [
  "login_attempted",
  "credentials_accepted",
  "credentials_rejected",
  "session_restored",
  "credentials_expired",
  "refresh_succeeded",
  "refresh_failed",
  "throttled",
  "cooldown_elapsed",
  "all_breakers_open",
  "breaker_closed",
  "breaker_recovery_due",
  "logout",
  "fault",
  "reset",
] as const;

export type ConnectionEvent = (typeof CONNECTION_EVENTS)[number];
