export const config = {
  port: Number(process.env.PORT || 5001),
  nodeEnv: (process.env.NODE_ENV || 'development'),
  logLevel: (process.env.LOG_LEVEL || 'info'),
  maxUploadBytes: Number(process.env.MAX_UPLOAD_BYTES || 25 * 1024 * 1024),
  preferredSheet: (process.env.PREFERRED_SHEET || 'Transactions'),
  previewRows: Number(process.env.PREVIEW_ROWS || 5),
  tablePageSize: Number(process.env.TABLE_PAGE_SIZE || 50),
};
