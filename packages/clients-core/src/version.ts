export const CLIENT_VERSION = "0.1.0";

export const DEFAULT_USER_AGENT = `geoengine-ts/${CLIENT_VERSION}`;
