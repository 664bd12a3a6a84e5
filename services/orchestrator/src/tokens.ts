export const APP_CONFIG = Symbol("APP_CONFIG");
export const AUDIT_REPOSITORY = Symbol("AUDIT_REPOSITORY");
export const CACHE_STORE = Symbol("CACHE_STORE");
