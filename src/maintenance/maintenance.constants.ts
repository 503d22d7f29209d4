/**
 * Injection token for the ordered list of maintenance rules
 */
export const MAINTENANCE_RULES = 'MAINTENANCE_RULES';
