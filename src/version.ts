export const ADVISOR_VERSION = '0.3.0';
