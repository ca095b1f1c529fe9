export const TETRA_CHANNEL_OPTIONS = Symbol('TETRA_CHANNEL_OPTIONS');
export const TETRA_CHANNEL_TRANSPORT = Symbol('TETRA_CHANNEL_TRANSPORT');

export const DEFAULT_TETRA_CHANNEL_BASE_URL = 'https://ch.tetr.io/api/';
export const DEFAULT_TETRA_CHANNEL_USER_AGENT = 'tetra-channel-client';

export const SESSION_ID_HEADER = 'X-Session-ID';
