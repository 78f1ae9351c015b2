export { buildProformaCsv, buildProformaRows, proformaCsvFilename } from './proformaCsv';
export { requestEstimateWorkbook, toWorkbookRequest, workbookFilename } from './workbookApi';
export type { WorkbookOptions, WorkbookRequest, WorkbookResult, WorkbookRow } from './workbookApi';
export { downloadBlob, downloadCsv } from './download';
