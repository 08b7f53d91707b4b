/**
 * Excel Export
 * Generates the expense workbook (.xlsx): optional title block, styled header,
 * one row per expense and a TOTAL formula row
 */

import { Workbook } from 'exceljs';
import type { Expense } from '../../../../../shared/types';
import logger from '../../logger';
import { roundCurrency } from '../currency/currency-code';

export const XLSX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

interface ExportColumn {
  header: string;
  width: number;
  value: (expense: Expense) => string | number;
}

const COLUMNS: ExportColumn[] = [
  { header: 'Date', width: 14, value: (e) => e.date },
  { header: 'Vendor', width: 28, value: (e) => e.vendor },
  { header: 'Location', width: 22, value: (e) => e.location },
  { header: 'Category', width: 18, value: (e) => e.category },
  { header: 'Subtotal', width: 14, value: (e) => e.subtotal },
  { header: 'Tax', width: 12, value: (e) => e.tax },
  { header: 'Tip', width: 12, value: (e) => e.tip },
  { header: 'Total', width: 14, value: (e) => e.total },
  { header: 'Payment Method', width: 18, value: (e) => e.paymentMethod },
  { header: 'Currency', width: 12, value: (e) => e.currency },
  { header: 'Items', width: 35, value: (e) => e.items },
  { header: 'Uploaded By', width: 20, value: (e) => e.uploadedBy },
];

const AMOUNT_COLUMNS = new Set([5, 6, 7, 8]);
const TOTAL_COLUMN = 8;
const AMOUNT_FORMAT = '#,##0.00';

export function exportFileName(date: Date = new Date()): string {
  return `expenses_${date.toISOString().slice(0, 10)}.xlsx`;
}

/**
 * Build the workbook for expenses already sorted in export order
 * @param title - company name shown above the table; omitted when empty
 */
export async function buildExpenseWorkbook(
  expenses: Expense[],
  title: string,
  exportedAt: Date = new Date()
): Promise<Buffer> {
  const log = logger.child({ rows: expenses.length });
  log.info('Generating expense workbook');

  const workbook = new Workbook();
  const sheet = workbook.addWorksheet('Expenses');

  let headerRow = 1;
  if (title) {
    sheet.getCell('A1').value = title;
    sheet.getCell('A1').font = { bold: true, size: 14 };
    sheet.getCell('A2').value = `Exported ${exportedAt.toISOString().slice(0, 10)}`;
    sheet.getCell('A2').font = { size: 10, color: { argb: 'FF888888' } };
    headerRow = 4;
  }

  const header = sheet.getRow(headerRow);
  COLUMNS.forEach((column, index) => {
    const cell = header.getCell(index + 1);
    cell.value = column.header;
    sheet.getColumn(index + 1).width = column.width;
  });
  header.font = { bold: true, color: { argb: 'FFFFFFFF' } };
  header.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF1F4E79' } };
  header.alignment = { horizontal: 'center', vertical: 'middle' };
  header.height = 28;
  sheet.views = [{ state: 'frozen', ySplit: headerRow }];

  const firstDataRow = headerRow + 1;
  expenses.forEach((expense, offset) => {
    const row = sheet.getRow(firstDataRow + offset);
    COLUMNS.forEach((column, index) => {
      const cell = row.getCell(index + 1);
      cell.value = column.value(expense);
      if (AMOUNT_COLUMNS.has(index + 1)) {
        cell.numFmt = AMOUNT_FORMAT;
      }
    });
  });

  // One blank row between the data and the total
  const lastDataRow = firstDataRow + expenses.length - 1;
  const totalRow = sheet.getRow(lastDataRow + 2);
  const totalColumnLetter = sheet.getColumn(TOTAL_COLUMN).letter;
  totalRow.getCell(TOTAL_COLUMN - 1).value = 'TOTAL:';
  totalRow.getCell(TOTAL_COLUMN).value = {
    formula: `SUM(${totalColumnLetter}${firstDataRow}:${totalColumnLetter}${lastDataRow})`,
    result: roundCurrency(expenses.reduce((sum, expense) => sum + expense.total, 0)),
    date1904: false,
  };
  totalRow.getCell(TOTAL_COLUMN).numFmt = AMOUNT_FORMAT;
  totalRow.font = { bold: true };

  return Buffer.from(await workbook.xlsx.writeBuffer());
}
