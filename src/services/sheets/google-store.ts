import fs from 'fs';
import path from 'path';
import { drive_v3, google, sheets_v4 } from 'googleapis';
import { z } from 'zod';
import { GOOGLE_SCOPES } from '../../config/constants';
import { CellValue, HeaderFormat, TabularStore } from '../../types/sheet';
import { ConnectivityError, errorMessage, toStoreError } from '../errors';

export interface GoogleStoreConfig {
  credentialsJson?: string;
  credentialsFile: string;
  spreadsheetId?: string;
  spreadsheetName: string;
}

const ServiceAccountSchema = z
  .object({
    client_email: z.string().email(),
    private_key: z.string().min(1),
  })
  .passthrough();

/** The parts of the Sheets v4 client the store calls. */
export interface SheetsClient {
  spreadsheets: {
    get(params: sheets_v4.Params$Resource$Spreadsheets$Get): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
    batchUpdate(params: sheets_v4.Params$Resource$Spreadsheets$Batchupdate): Promise<unknown>;
    values: {
      get(params: sheets_v4.Params$Resource$Spreadsheets$Values$Get): Promise<{ data: sheets_v4.Schema$ValueRange }>;
      append(params: sheets_v4.Params$Resource$Spreadsheets$Values$Append): Promise<unknown>;
      clear(params: sheets_v4.Params$Resource$Spreadsheets$Values$Clear): Promise<unknown>;
    };
  };
}

export interface DriveClient {
  files: {
    list(params: drive_v3.Params$Resource$Files$List): Promise<{ data: drive_v3.Schema$FileList }>;
  };
}

export interface SpreadsheetTarget {
  spreadsheetId?: string;
  spreadsheetName: string;
}

export interface ResolvedCredentials {
  email: string;
  keyFile?: string;
  credentials?: { client_email: string; private_key: string };
  source: string;
}

function parseServiceAccount(raw: string, source: string): z.infer<typeof ServiceAccountSchema> {
  try {
    return ServiceAccountSchema.parse(JSON.parse(raw));
  } catch (error) {
    throw new ConnectivityError(`Credenciais inválidas em ${source}: ${errorMessage(error)}`, { cause: error });
  }
}

/** Nearest directory above `start` holding a package.json, from src/ or dist/ alike. */
export function findAppRoot(start: string = __dirname): string {
  let dir = start;
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) return start;
    dir = parent;
  }
  return dir;
}

export function credentialCandidates(fileName: string, start: string = __dirname): string[] {
  const candidates = [path.resolve(fileName), path.join(findAppRoot(start), fileName)];
  return [...new Set(candidates)];
}

export function resolveCredentials(config: GoogleStoreConfig): ResolvedCredentials {
  if (config.credentialsJson) {
    const account = parseServiceAccount(config.credentialsJson, 'GOOGLE_CREDENTIALS_JSON');
    return {
      email: account.client_email,
      credentials: { client_email: account.client_email, private_key: account.private_key },
      source: 'GOOGLE_CREDENTIALS_JSON',
    };
  }

  const candidates = credentialCandidates(config.credentialsFile);
  const keyFile = candidates.find((candidate) => fs.existsSync(candidate));

  if (!keyFile) {
    throw new ConnectivityError(
      `Arquivo de credenciais não encontrado. Procurado em: ${candidates.join(', ')}`
    );
  }

  const account = parseServiceAccount(fs.readFileSync(keyFile, 'utf8'), keyFile);
  return { email: account.client_email, keyFile, source: path.basename(keyFile) };
}

export function cellToString(cell: unknown): string {
  if (cell === null || cell === undefined) return '';
  if (typeof cell === 'string') return cell;
  return String(cell);
}

export function quoteSheetTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

/**
 * First tab of a Google spreadsheet, accessed through the Sheets v4 API
 * with a service account.
 */
export class GoogleSheetsStore implements TabularStore {
  private constructor(
    private readonly sheets: SheetsClient,
    private readonly spreadsheetId: string,
    private readonly sheetId: number,
    private readonly sheetTitle: string
  ) {}

  static async connect(config: GoogleStoreConfig): Promise<GoogleSheetsStore> {
    const resolved = resolveCredentials(config);
    const auth = new google.auth.GoogleAuth({
      keyFile: resolved.keyFile,
      credentials: resolved.credentials,
      scopes: GOOGLE_SCOPES,
    });

    return GoogleSheetsStore.open(
      google.sheets({ version: 'v4', auth }),
      google.drive({ version: 'v3', auth }),
      config,
      resolved
    );
  }

  /**
   * Locate the spreadsheet (by id, else by name through Drive) and bind to its first tab.
   */
  static async open(
    sheets: SheetsClient,
    drive: DriveClient,
    target: SpreadsheetTarget,
    account: Pick<ResolvedCredentials, 'email' | 'source'>
  ): Promise<GoogleSheetsStore> {
    try {
      let spreadsheetId = target.spreadsheetId;
      if (!spreadsheetId) {
        const escapedName = target.spreadsheetName.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
        const found = await drive.files.list({
          q: `name = '${escapedName}' and mimeType = 'application/vnd.google-apps.spreadsheet' and trashed = false`,
          fields: 'files(id, name)',
          pageSize: 1,
        });
        spreadsheetId = found.data.files?.[0]?.id ?? undefined;
      }

      if (!spreadsheetId) {
        throw new ConnectivityError(
          `Planilha '${target.spreadsheetName}' não encontrada. Compartilhe-a com ${account.email}.`
        );
      }

      const meta = await sheets.spreadsheets.get({ spreadsheetId, fields: 'sheets.properties' });
      const first = meta.data.sheets?.[0]?.properties;
      if (!first || first.title === null || first.title === undefined) {
        throw new ConnectivityError(`Planilha ${spreadsheetId} não possui abas`);
      }

      console.log(`[Sheets] Connected as ${account.email} (${account.source}), tab '${first.title}'`);
      return new GoogleSheetsStore(sheets, spreadsheetId, first.sheetId ?? 0, first.title);
    } catch (error) {
      throw toStoreError(error, (message, options) => new ConnectivityError(message, options));
    }
  }

  describe(): string {
    return `${this.spreadsheetId}/${this.sheetTitle}`;
  }

  async getAllValues(): Promise<string[][]> {
    const response = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: quoteSheetTitle(this.sheetTitle),
      valueRenderOption: 'UNFORMATTED_VALUE',
      // Date-typed cells come back as shown (15/03/2024), not as serial numbers.
      dateTimeRenderOption: 'FORMATTED_STRING',
    });

    const rows: unknown[][] = response.data.values ?? [];
    return rows.map((row) => row.map(cellToString));
  }

  async appendRows(rows: CellValue[][]): Promise<void> {
    if (rows.length === 0) return;

    await this.sheets.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: `${quoteSheetTitle(this.sheetTitle)}!A1`,
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: { values: rows },
    });
  }

  async clear(): Promise<void> {
    await this.sheets.spreadsheets.values.clear({
      spreadsheetId: this.spreadsheetId,
      range: quoteSheetTitle(this.sheetTitle),
    });
  }

  async formatHeaderRow(format: HeaderFormat): Promise<void> {
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [
          {
            repeatCell: {
              range: { sheetId: this.sheetId, startRowIndex: 0, endRowIndex: 1 },
              cell: {
                userEnteredFormat: {
                  backgroundColor: format.backgroundColor,
                  horizontalAlignment: format.horizontalAlignment,
                  textFormat: {
                    foregroundColor: format.foregroundColor,
                    fontSize: format.fontSize,
                    bold: format.bold,
                  },
                },
              },
              fields: 'userEnteredFormat(backgroundColor,textFormat,horizontalAlignment)',
            },
          },
        ],
      },
    });
  }

  async setColumnWidths(widths: readonly number[]): Promise<void> {
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: widths.map((pixelSize, index) => ({
          updateDimensionProperties: {
            range: { sheetId: this.sheetId, dimension: 'COLUMNS', startIndex: index, endIndex: index + 1 },
            properties: { pixelSize },
            fields: 'pixelSize',
          },
        })),
      },
    });
  }
}
