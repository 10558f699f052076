import { Readable } from 'stream';
import { describe, it, expect } from 'vitest';
import ExcelJS from 'exceljs';
import { COLUMNS } from '../src/config/constants';
import {
  escapeCsvField,
  exportFileName,
  exportToCSV,
  generateReportText,
  handleExport,
  isExportFormat,
  UTF8_BOM,
} from '../src/services/export';
import { formatCurrency } from '../src/services/feedback/messages';
import { makeRow } from './helpers/rows';

const GENERATED_AT = new Date(2024, 2, 20, 9, 5);

describe('CSV export', () => {
  it('should start with a UTF-8 BOM and the header line', () => {
    const data = exportToCSV([makeRow()]);

    expect([...data.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
    expect(data.subarray(3).toString('utf8').split('\n')[0]).toBe(COLUMNS.join(','));
  });

  it('should write one line per row with escaped fields', () => {
    const data = exportToCSV([
      makeRow({ description: 'Tinta, branca', notes: 'diz "ok"' }),
      makeRow({ date: null, total: 27.5 }),
    ]);
    const lines = data.subarray(UTF8_BOM.length).toString('utf8').split('\n');

    expect(lines).toHaveLength(4);
    expect(lines[1]).toBe('15/03/2024,Obra A,Ferramentas,"Tinta, branca",1,100,100,0,100,Pago,PIX,"diz ""ok"""');
    expect(lines[2]).toBe(',Obra A,Ferramentas,Martelo,1,100,100,0,27.5,Pago,PIX,');
    expect(lines[3]).toBe('');
  });

  it('should escape only when needed', () => {
    expect(escapeCsvField('simples')).toBe('simples');
    expect(escapeCsvField('linha\nnova')).toBe('"linha\nnova"');
  });
});

describe('Text report', () => {
  it('should render the summary, categories and detailed rows', () => {
    const report = generateReportText(
      [
        makeRow({ total: 100 }),
        makeRow({ date: null, client: 'Obra B', description: 'Serrote', total: 50, paymentStatus: 'Pendente' }),
      ],
      GENERATED_AT
    );

    expect(report).toBe(
      [
        'CONTROLE DE CUSTOS - RELATÓRIO DE CUSTOS',
        'Gerado em: 20/03/2024 09:05',
        '',
        'RESUMO FINANCEIRO:',
        '- Total de Registros: 2',
        '- Valor Total: R$ 150.00',
        '- Ticket Médio: R$ 75.00',
        '- Pagamentos Pendentes: 1',
        '',
        'DISTRIBUIÇÃO POR CATEGORIA:',
        '- Ferramentas: R$ 150.00',
        '',
        'REGISTROS DETALHADOS:',
        '',
        'Data: 15/03/2024',
        'Cliente: Obra A',
        'Categoria: Ferramentas',
        'Descrição: Martelo',
        'Total: R$ 100.00',
        'Status: Pago',
        '---',
        '',
        'Data: N/A',
        'Cliente: Obra B',
        'Categoria: Ferramentas',
        'Descrição: Serrote',
        'Total: R$ 50.00',
        'Status: Pendente',
        '---',
        '',
      ].join('\n')
    );
  });

  it('should use a custom title', () => {
    expect(generateReportText([], GENERATED_AT, 'OBRA CENTRO').split('\n')[0]).toBe(
      'OBRA CENTRO - RELATÓRIO DE CUSTOS'
    );
  });

  it('should format currency with two decimals and separators', () => {
    expect(formatCurrency(1234.5)).toBe('R$ 1,234.50');
    expect(formatCurrency(0)).toBe('R$ 0.00');
  });
});

describe('Export handler', () => {
  it('should name files with the generation timestamp', () => {
    const moment = new Date(2024, 0, 5, 7, 3);
    expect(exportFileName('csv', moment)).toBe('custos_20240105_0703.csv');
    expect(exportFileName('xlsx', moment)).toBe('custos_20240105_0703.xlsx');
    expect(exportFileName('txt', moment)).toBe('relatorio_custos_20240105_0703.txt');
    expect(exportFileName('pdf', moment)).toBe('relatorio_custos_20240105_0703.pdf');
  });

  it('should recognize supported formats', () => {
    expect(isExportFormat('csv')).toBe(true);
    expect(isExportFormat('json')).toBe(false);
  });

  it('should return the text report as a buffer', async () => {
    const rows = [makeRow()];
    const result = await handleExport({ format: 'txt', rows, generatedAt: GENERATED_AT });

    expect(result.success).toBe(true);
    expect(result.fileName).toBe('relatorio_custos_20240320_0905.txt');
    expect(result.mimeType).toBe('text/plain');
    expect(result.message).toBe('Arquivo pronto: relatorio_custos_20240320_0905.txt');
    expect(result.data?.toString('utf8')).toBe(generateReportText(rows, GENERATED_AT));
  });

  it('should produce a workbook that reads back', async () => {
    const result = await handleExport({
      format: 'xlsx',
      rows: [makeRow(), makeRow({ client: 'Obra B', total: 50 })],
      generatedAt: GENERATED_AT,
    });
    expect(result.success).toBe(true);
    expect(result.data).toBeDefined();

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.read(Readable.from(result.data ?? Buffer.alloc(0)));
    const sheet = workbook.getWorksheet('Custos');

    expect(sheet?.rowCount).toBe(3);
    expect(sheet?.getCell('A1').value).toBe('Data');
    expect(sheet?.getCell('L1').value).toBe('Observações');
    expect(sheet?.getCell('B3').value).toBe('Obra B');
    expect(sheet?.getCell('I3').value).toBe(50);
  });

  it('should produce a PDF document', async () => {
    const result = await handleExport({ format: 'pdf', rows: [makeRow()], generatedAt: GENERATED_AT });

    expect(result.success).toBe(true);
    expect(result.mimeType).toBe('application/pdf');
    expect(result.data?.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });
});
