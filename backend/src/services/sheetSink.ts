import dayjs from "dayjs";
import { google, type sheets_v4 } from "googleapis";
import { SinkError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { ApplicationRecord, RecordSink } from "../types.js";
import type { GoogleCredentials } from "./gmailService.js";

const log = logger.child("sheets");

export const SHEET_TAB = "Applications";
export const SHEET_HEADER = ["Company", "Role", "Stage", "Type", "Date Applied", "Last Updated", "Notes"];

const TYPE_LABEL: Record<ApplicationRecord["applicationType"], string> = {
  "full-time": "Full-time",
  internship: "Internship",
  unknown: "",
};

/** Plain cell values, newest record first. */
export const buildSheetRows = (records: readonly ApplicationRecord[]): string[][] => {
  const sorted = [...records].sort(
    (a, b) => b.lastUpdated.getTime() - a.lastUpdated.getTime() || a.displayCompany.localeCompare(b.displayCompany),
  );
  return [
    SHEET_HEADER,
    ...sorted.map((record) => [
      record.displayCompany,
      record.displayRole,
      record.currentStage,
      TYPE_LABEL[record.applicationType],
      dayjs(record.dateFirstApplied).format("YYYY-MM-DD"),
      dayjs(record.lastUpdated).format("YYYY-MM-DD"),
      record.notes,
    ]),
  ];
};

export const createSheetsClient = (credentials: GoogleCredentials): sheets_v4.Sheets => {
  const oauth2Client = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret);
  oauth2Client.setCredentials({ refresh_token: credentials.refreshToken });
  return google.sheets({ version: "v4", auth: oauth2Client });
};

/** Rewrites the Applications tab with the full record set on every upsert. */
export class GoogleSheetsSink implements RecordSink {
  readonly name = "google-sheets";

  constructor(
    private readonly sheets: sheets_v4.Sheets,
    private readonly spreadsheetId: string,
    private readonly tab: string = SHEET_TAB,
  ) {}

  async upsert(records: readonly ApplicationRecord[]): Promise<void> {
    const rows = buildSheetRows(records);
    try {
      await this.ensureTab();
      await this.sheets.spreadsheets.values.clear({
        spreadsheetId: this.spreadsheetId,
        range: `${this.tab}!A:G`,
      });
      await this.sheets.spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range: `${this.tab}!A1`,
        valueInputOption: "RAW",
        requestBody: { values: rows },
      });
    } catch (error) {
      throw new SinkError(`Google Sheets export failed: ${errorMessage(error)}`, { cause: error });
    }
    log.info("Exported applications to Google Sheets", { rows: rows.length - 1 });
  }

  private async ensureTab(): Promise<void> {
    const spreadsheet = await this.sheets.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: "sheets.properties.title",
    });
    const exists = (spreadsheet.data.sheets ?? []).some((sheet) => sheet.properties?.title === this.tab);
    if (exists) {
      return;
    }
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: { requests: [{ addSheet: { properties: { title: this.tab } } }] },
    });
  }
}

/** Used when no spreadsheet is configured. */
export class NullSink implements RecordSink {
  readonly name = "none";

  async upsert(records: readonly ApplicationRecord[]): Promise<void> {
    log.debug("No spreadsheet configured; skipping export", { records: records.length });
  }
}
