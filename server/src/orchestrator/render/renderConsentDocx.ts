import {
  Document,
  Packer,
  Paragraph,
  TextRun,
  Table,
  TableRow,
  TableCell,
  WidthType,
  ShadingType,
  VerticalMergeType,
} from "docx";
import type { MergedReportRow, MergeSpan } from "@shared/schema";
import { renderStatus } from "../../consent/rowEmitter";

type VerticalMerge = (typeof VerticalMergeType)[keyof typeof VerticalMergeType];

// Font configuration
const FONTS = {
  TITLE: { name: "Arial", size: 24 },           // Arial 12pt = 24 half-points
  BODY: { name: "Arial", size: 20 },            // Arial 10pt = 20 half-points
  TABLE: { name: "Calibri", size: 20 },         // Calibri 10pt = 20 half-points
};

export const REPORT_COLUMNS = [
  "Patient-ID",
  "Version of Informed Consent Form",
  "Date of Consent",
  "Comment",
] as const;

export interface ConsentDocxInput {
  merged: readonly MergedReportRow[];
  spans: readonly MergeSpan[];
}

export interface ConsentDocxMeta {
  title?: string;
  studyId?: string;
  generatedAt?: Date;
}

function createTitle(text: string): Paragraph {
  return new Paragraph({
    children: [new TextRun({ text, font: FONTS.TITLE.name, size: FONTS.TITLE.size, bold: true })],
    spacing: { before: 200, after: 100 },
  });
}

function createBodyText(text: string): Paragraph {
  return new Paragraph({
    children: [new TextRun({ text, font: FONTS.BODY.name, size: FONTS.BODY.size })],
    spacing: { before: 60, after: 60 },
  });
}

function createTableHeaderCell(text: string): TableCell {
  return new TableCell({
    children: [new Paragraph({
      children: [new TextRun({ text, font: FONTS.TABLE.name, size: FONTS.TABLE.size, bold: true })],
    })],
    shading: { fill: "E8E8E8", type: ShadingType.SOLID },
  });
}

// Multi-line text becomes one paragraph with line breaks
function createTableCell(text: string, verticalMerge?: VerticalMerge): TableCell {
  const lines = text.split("\n");
  return new TableCell({
    children: [new Paragraph({
      children: lines.map((line, i) =>
        new TextRun({ text: line, font: FONTS.TABLE.name, size: FONTS.TABLE.size, break: i > 0 ? 1 : undefined }),
      ),
    })],
    verticalMerge,
  });
}

/** Merge state of the participant cells for each row index */
export function verticalMergeByRow(rowCount: number, spans: readonly MergeSpan[]): (VerticalMerge | undefined)[] {
  const states: (VerticalMerge | undefined)[] = new Array(rowCount).fill(undefined);
  for (const span of spans) {
    if (span.length < 2) continue;
    states[span.start] = VerticalMergeType.RESTART;
    for (let i = span.start + 1; i < span.start + span.length; i++) {
      states[i] = VerticalMergeType.CONTINUE;
    }
  }
  return states;
}

export function buildConsentTable(input: ConsentDocxInput): Table {
  const mergeStates = verticalMergeByRow(input.merged.length, input.spans);

  const rows = [
    new TableRow({
      tableHeader: true,
      children: REPORT_COLUMNS.map(createTableHeaderCell),
    }),
    ...input.merged.map((row, index) => {
      const merge = mergeStates[index];
      return new TableRow({
        children: [
          createTableCell(row.participantId, merge),
          createTableCell(row.version),
          createTableCell(renderStatus(row.status)),
          createTableCell(row.comment, merge),
        ],
      });
    }),
  ];

  return new Table({ rows, width: { size: 100, type: WidthType.PERCENTAGE } });
}

export async function renderConsentReportDocx(
  report: ConsentDocxInput,
  meta: ConsentDocxMeta = {},
): Promise<Buffer> {
  const generatedAt = meta.generatedAt ?? new Date();
  const children: (Paragraph | Table)[] = [createTitle(meta.title ?? "Consent Report")];

  if (meta.studyId) {
    children.push(createBodyText(`Study: ${meta.studyId}`));
  }
  children.push(buildConsentTable(report));
  children.push(new Paragraph({
    children: [new TextRun({
      text: `Generated on ${generatedAt.toISOString().split("T")[0]}`,
      italics: true,
      font: FONTS.BODY.name,
      size: 16,
    })],
    spacing: { before: 200 },
  }));

  const doc = new Document({ sections: [{ children }] });
  return await Packer.toBuffer(doc);
}
