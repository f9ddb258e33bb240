export const RULEMUX_VERSION = "0.1.0"
