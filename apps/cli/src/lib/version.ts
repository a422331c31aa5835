export const LABFLOW_VERSION = '0.3.0';
