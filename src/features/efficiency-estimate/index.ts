export { estimateEfficiency, formatEfficiency } from './efficiency-estimate';
export { efficiencyParametersFromConfig } from './helpers';
export type { EfficiencyEstimate, EfficiencyParameters } from './types';
