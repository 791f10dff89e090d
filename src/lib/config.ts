/*
  Runtime settings, read once from the environment.

  Environment:
    PREVIEW_ROWS          # rows shown before/after a fix (default 5)
    MAX_SESSIONS          # in-memory session cap, oldest evicted first (default 50)
    EXPORT_SHEET_NAME     # sheet name of the exported workbook (default Validated_Data)
    EXPORT_FILE_NAME      # download name of the exported workbook (default validated_data.xlsx)
    GENERIC_DATE_FORMAT   # date fix default when the column name carries no hint (default yyyy-mm-dd)
*/

export interface AppConfig {
  previewRows: number;
  maxSessions: number;
  exportSheetName: string;
  exportFileName: string;
  genericDateFormat: string;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return raw && Number.isInteger(n) && n > 0 ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    previewRows: positiveInt(env.PREVIEW_ROWS, 5),
    maxSessions: positiveInt(env.MAX_SESSIONS, 50),
    exportSheetName: env.EXPORT_SHEET_NAME || 'Validated_Data',
    exportFileName: env.EXPORT_FILE_NAME || 'validated_data.xlsx',
    genericDateFormat: env.GENERIC_DATE_FORMAT || 'yyyy-mm-dd',
  };
}

export const config = loadConfig();
