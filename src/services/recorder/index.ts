export { JsonlDecisionRecorder } from './jsonl-recorder.js';
export { formatSummaryReport } from './report.js';
