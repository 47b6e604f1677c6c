import ExcelJS from "exceljs";
import type { FormatReader } from "../FormatReader.js";

/** One `Sheet: <name>` line per worksheet, then each non-empty row joined with ` | `. */
export class SpreadsheetReader implements FormatReader {
  readonly name = "spreadsheet";
  readonly extensions = [".xlsx", ".xls"];

  async read(filePath: string): Promise<string> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);
    const lines: string[] = [];
    for (const sheet of workbook.worksheets) {
      lines.push(`Sheet: ${sheet.name}`);
      sheet.eachRow((row) => {
        const cells: string[] = [];
        row.eachCell((cell) => {
          cells.push(cell.text);
        });
        if (cells.length) lines.push(cells.join(" | "));
      });
    }
    return lines.join("\n").trim();
  }
}
