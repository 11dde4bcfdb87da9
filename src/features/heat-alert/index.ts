export { decideAlert, formatAlertMessage } from './heat-alert';
export { escapeHtml, fmtDistance, fmtOneDecimal } from './helpers';
export type { AlertDecision, HeatAlertConfig } from './types';
