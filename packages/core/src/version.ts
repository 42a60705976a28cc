/** Version reported to remote servers as client info */
export const BRIDGE_VERSION = '0.1.0';
