import * as XLSX from "xlsx";

export interface ParsedRow {
  [key: string]: unknown;
}

export interface FileParseResult {
  success: boolean;
  rows: ParsedRow[];
  columns: string[];
  errors: string[];
  fileType: "csv" | "xlsx";
  sheetName?: string;
}

export interface FileParseOptions {
  /** Sheet to read when the workbook has it; otherwise the first sheet is used */
  preferredSheet?: string;
}

export function parseFileBuffer(buffer: Buffer, filename: string, options: FileParseOptions = {}): FileParseResult {
  const ext = filename.toLowerCase().split(".").pop();

  if (ext === "xlsx" || ext === "xls") {
    return parseExcelBuffer(buffer, options.preferredSheet);
  } else if (ext === "csv") {
    return parseCsvBuffer(buffer);
  } else {
    return {
      success: false,
      rows: [],
      columns: [],
      errors: [`Unsupported file type: ${ext}. Use CSV or XLSX.`],
      fileType: "csv",
    };
  }
}

function parseExcelBuffer(buffer: Buffer, preferredSheet?: string): FileParseResult {
  try {
    // Date cells stay Excel serial numbers; cellDates builds them from a local-time epoch
    const workbook = XLSX.read(buffer, { type: "buffer" });
    const sheetName =
      preferredSheet && workbook.SheetNames.includes(preferredSheet)
        ? preferredSheet
        : workbook.SheetNames[0];

    if (!sheetName) {
      return {
        success: false,
        rows: [],
        columns: [],
        errors: ["No sheets found in Excel file"],
        fileType: "xlsx",
      };
    }

    const worksheet = workbook.Sheets[sheetName];
    // raw values keep date serials instead of locale-formatted text
    const jsonData = XLSX.utils.sheet_to_json<ParsedRow>(worksheet, {
      raw: true,
      defval: null,
    });

    if (jsonData.length === 0) {
      return {
        success: false,
        rows: [],
        columns: [],
        errors: ["No data found in Excel file"],
        fileType: "xlsx",
        sheetName,
      };
    }

    const columns = Object.keys(jsonData[0] || {});

    return {
      success: true,
      rows: jsonData,
      columns,
      errors: [],
      fileType: "xlsx",
      sheetName,
    };
  } catch (error) {
    return {
      success: false,
      rows: [],
      columns: [],
      errors: [`Failed to parse Excel file: ${error instanceof Error ? error.message : "Unknown error"}`],
      fileType: "xlsx",
    };
  }
}

function detectDelimiter(headerLine: string): "," | ";" {
  const commas = headerLine.split(",").length;
  const semicolons = headerLine.split(";").length;
  return semicolons > commas ? ";" : ",";
}

function parseCsvBuffer(buffer: Buffer): FileParseResult {
  try {
    const content = buffer.toString("utf-8").replace(/^\uFEFF/, "");
    const lines = content.split(/\r?\n/).filter(line => line.trim().length > 0);

    if (lines.length === 0) {
      return {
        success: false,
        rows: [],
        columns: [],
        errors: ["Empty CSV file"],
        fileType: "csv",
      };
    }

    const headerLine = lines[0];
    const delimiter = detectDelimiter(headerLine);
    const columns = parseCSVLine(headerLine, delimiter);

    const rows: ParsedRow[] = [];
    const errors: string[] = [];

    for (let i = 1; i < lines.length; i++) {
      const values = parseCSVLine(lines[i], delimiter);

      if (values.length !== columns.length) {
        errors.push(`Row ${i + 1}: Column count mismatch (expected ${columns.length}, got ${values.length})`);
        continue;
      }

      const row: ParsedRow = {};
      for (let j = 0; j < columns.length; j++) {
        row[columns[j]] = values[j] || null;
      }
      rows.push(row);
    }

    return {
      success: true,
      rows,
      columns,
      errors,
      fileType: "csv",
    };
  } catch (error) {
    return {
      success: false,
      rows: [],
      columns: [],
      errors: [`Failed to parse CSV file: ${error instanceof Error ? error.message : "Unknown error"}`],
      fileType: "csv",
    };
  }
}

function parseCSVLine(line: string, delimiter: "," | ";"): string[] {
  const result: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    const nextChar = line[i + 1];

    if (char === '"' && !inQuotes) {
      inQuotes = true;
    } else if (char === '"' && inQuotes) {
      if (nextChar === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = false;
      }
    } else if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}
