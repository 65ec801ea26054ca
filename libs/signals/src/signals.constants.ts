export const SIGNAL_ENGINE_CONFIG = Symbol('SIGNAL_ENGINE_CONFIG');
export const SNAPSHOT_PARAMS = Symbol('SNAPSHOT_PARAMS');
