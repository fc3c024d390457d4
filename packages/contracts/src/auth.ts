export const AUTH_SCHEMES = ['none', 'basic', 'bearer', 'apikey'] as const;

export type AuthScheme = (typeof AUTH_SCHEMES)[number];
