import PDFDocument from "pdfkit";
import { AREA_LABELS, PEOPLE, PERSON_LABELS, type Person } from "./config.js";
import { dayParts } from "./dates.js";
import type { WeekSchedule } from "./scheduler.js";

const PURPLE_50 = "#FAF5FF";
const GRAY_50   = "#F9FAFB";
const BLACK     = "#000000";
const GRAY_500  = "#6B7280";

type Theme = {
  primary: string;      // table outline
  headerBg: string;
  headerFg: string;
  weekBg: string;       // left column bg (body)
  doneFg: string;       // tasks already completed
};

const THEME: Theme = {
  primary: "#333333",
  headerBg: PURPLE_50,
  headerFg: BLACK,
  weekBg: GRAY_50,
  doneFg: GRAY_500,
};

const TITLE_FS  = 14;
const HEADER_FS = 10;
const CELL_FS   = 8.5;
const HEADER_H  = 22;
const ROW_H     = 30;
const WEEKCOL_W = 120;

// draw text inside a box and vertically center it
function drawTextInBox(
  doc: PDFKit.PDFDocument,
  text: string,
  x: number,
  y: number,
  w: number,
  h: number,
  fontSize: number,
  color: string,
  align: "left" | "center" = "left",
  padY = 3,
) {
  doc.fontSize(fontSize).fillColor(color);
  const textHeight = doc.heightOfString(text, { width: w, align });
  const centered = y + Math.max(padY, (h - textHeight) / 2);
  doc.text(text, x, centered, { width: w, height: h, align });
}

const shortDate = (day: string) => {
  const [, m, d] = dayParts(day);
  return `${String(d).padStart(2, "0")}.${String(m).padStart(2, "0")}`;
};

function cellText(week: WeekSchedule, person: Person): { text: string; done: boolean } {
  const tasks = week.tasks.filter(t => t.person === person);
  const lines = tasks.map(t => `${t.limpieza_completada ? "[x]" : "[ ]"} ${AREA_LABELS[t.area]}`);
  return { text: lines.join("\n"), done: tasks.length > 0 && tasks.every(t => t.limpieza_completada) };
}

/** Writes the stored weeks as an A4 landscape table, one row per week, and ends the stream. */
export function renderPlanPdf(weeks: WeekSchedule[], out: NodeJS.WritableStream) {
  const doc = new PDFDocument({
    size: "A4",
    layout: "landscape",
    margins: { top: 22, right: 22, bottom: 24, left: 22 },
  });
  doc.pipe(out);

  const left    = doc.page.margins.left;
  const top     = doc.page.margins.top;
  const usableW = doc.page.width - doc.page.margins.left - doc.page.margins.right;
  const bottom  = doc.page.height - doc.page.margins.bottom;
  const cellW   = (usableW - WEEKCOL_W) / PEOPLE.length;

  const drawHeader = (y: number) => {
    doc.save();
    doc.rect(left, y, usableW, HEADER_H).fill(THEME.headerBg);
    doc.restore();
    doc.rect(left, y, WEEKCOL_W, HEADER_H).strokeColor(THEME.primary).lineWidth(0.6).stroke();
    drawTextInBox(doc, "Semana", left + 6, y, WEEKCOL_W - 12, HEADER_H, HEADER_FS, THEME.headerFg);
    PEOPLE.forEach((p, i) => {
      const x = left + WEEKCOL_W + cellW * i;
      doc.rect(x, y, cellW, HEADER_H).strokeColor(THEME.primary).lineWidth(0.6).stroke();
      drawTextInBox(doc, PERSON_LABELS[p], x + 6, y, cellW - 12, HEADER_H, HEADER_FS, THEME.headerFg, "center");
    });
    return y + HEADER_H;
  };

  doc.fontSize(TITLE_FS).fillColor(BLACK).text("PLAN DE LIMPIEZA – CASA LIMPIA", left, top);
  let y = drawHeader(top + 20);

  for (const week of weeks) {
    if (y + ROW_H > bottom) {
      doc.addPage();
      y = drawHeader(doc.page.margins.top);
    }

    doc.rect(left, y, WEEKCOL_W, ROW_H).fillAndStroke(THEME.weekBg, THEME.primary);
    const label = `S${week.week_number} · ${shortDate(week.week_start)} – ${shortDate(week.week_end)}`;
    drawTextInBox(doc, label, left + 6, y, WEEKCOL_W - 12, ROW_H, CELL_FS, BLACK);

    PEOPLE.forEach((p, i) => {
      const x = left + WEEKCOL_W + cellW * i;
      const { text, done } = cellText(week, p);
      doc.rect(x, y, cellW, ROW_H).strokeColor(THEME.primary).lineWidth(0.4).stroke();
      drawTextInBox(doc, text, x + 6, y, cellW - 12, ROW_H, CELL_FS, done ? THEME.doneFg : BLACK);
    });

    y += ROW_H;
  }

  doc.end();
}
