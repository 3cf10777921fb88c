import ExcelJS from 'exceljs';

export type SheetRows = ExcelJS.CellValue[][];

/** Build an .xlsx in memory; `null` leaves a cell unwritten and an empty row leaves the row absent */
export async function buildWorkbook(sheets: Record<string, SheetRows>): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  for (const [name, rows] of Object.entries(sheets)) {
    const ws = workbook.addWorksheet(name);
    rows.forEach((row, r) => {
      row.forEach((value, c) => {
        if (value !== null) ws.getCell(r + 1, c + 1).value = value;
      });
    });
  }
  const out = await workbook.xlsx.writeBuffer();
  return Buffer.from(out);
}

/** Inventory workbook used across suites: two sheets, one blank header, one missing row */
export function inventoryWorkbook(): Promise<Buffer> {
  return buildWorkbook({
    Hosts: [
      ['Name', 'IP', null, 'Owner'],
      ['alpha-server', '10.0.0.1', 42, 'ops'],
      [],
      ['beta-server', '10.0.0.2', 3.5, null],
      ['   '],
    ],
    Contacts: [
      ['Team', 'Email'],
      ['Ops', 'ops@example.com'],
      ['Alpha Squad', 'alpha@example.com'],
    ],
  });
}

export const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
