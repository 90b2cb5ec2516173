export { runDiagnose, logDiagnoseReport } from './diagnose';
export type { DiagnoseDeps } from './diagnose';
export type { DiagnoseReport, TemplateProbe } from './types';
