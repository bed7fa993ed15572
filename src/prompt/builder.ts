/**
 * Analysis prompt assembly: tender summary, item table and the cleaned
 * document text, bounded to a total length.
 */
import type { PipelineResult } from "../core/types.js";
import { DEFAULT_MAX_CHARS, truncate } from "../cleaning/truncate.js";
import { createChildLogger } from "../logger.js";

const log = createChildLogger({ module: "prompt" });

export const PROMPT_MAX_LENGTH = 16000;

export const TEXT_CUT_MARKER = "\n\n[Текст обрезан для экономии токенов]";
export const PROMPT_CUT_MARKER = "\n\n[Промпт обрезан из-за ограничения по длине]";

/** Below this many characters of room the document text is not worth keeping. */
const MIN_TEXT_ROOM = 100;

export interface TenderSummary {
  number?: string;
  title?: string;
  customer?: string;
  region?: string;
  price?: number | string | null;
  deadline?: string;
  link?: string;
  sourceLink?: string;
}

export interface TenderItem {
  name: string;
  quantity: number;
  unit?: string;
  price: number;
  total: number;
}

export interface PromptInput {
  summary: TenderSummary;
  items?: TenderItem[];
  text?: string;
}

/** `1234567.5` → `"1 234 567.50"`; missing or unparsable prices read "Не указана". */
export function formatPrice(price: number | string | null | undefined): string {
  if (price === null || price === undefined || price === "") return "Не указана";
  const value = typeof price === "number" ? price : Number(String(price).replace(/\s/g, ""));
  if (!Number.isFinite(value)) return String(price);
  const [whole, frac] = value.toFixed(2).split(".");
  return `${whole.replace(/\B(?=(\d{3})+(?!\d))/g, " ")}.${frac}`;
}

function headLines(summary: TenderSummary, items: TenderItem[]): string[] {
  const lines = [
    "🔍 АНАЛИЗ ТЕНДЕРА",
    "=".repeat(60),
    "",
    "📋 ОСНОВНАЯ ИНФОРМАЦИЯ:",
    `• Номер: ${summary.number ?? "Не указан"}`,
    `• Название: ${summary.title ?? "Не указано"}`,
    `• Заказчик: ${summary.customer ?? "Не указан"}`,
    `• Регион: ${summary.region ?? "Не указан"}`,
    `• Начальная цена: ${formatPrice(summary.price)} руб.`,
    `• Срок подачи: ${summary.deadline ?? "Не указан"}`,
  ];
  if (summary.link) lines.push(`• Ссылка: ${summary.link}`);
  if (summary.sourceLink) lines.push(`• Ссылка на источник: ${summary.sourceLink}`);

  if (items.length > 0) {
    lines.push("", `📦 ТОВАРНЫЕ ПОЗИЦИИ (${items.length}):`);
    items.forEach((item, i) => {
      const unit = item.unit ? ` ${item.unit}` : "";
      lines.push(
        `${i + 1}. ${item.name}: ${item.quantity}${unit} × ${formatPrice(item.price)} = ${formatPrice(item.total)} руб.`,
      );
    });
  }
  return lines;
}

const TAIL_LINES = [
  "",
  "Выдели из документации технические требования к товару, требования к участнику, сроки и условия поставки, порядок приемки и оплаты. Отметь риски и неоднозначные формулировки.",
];

function render(head: string[], text: string): string {
  const body = text ? ["", "📄 ДОКУМЕНТАЦИЯ:", "<<<", text, ">>>"] : [];
  return [...head, ...body, ...TAIL_LINES].join("\n");
}

/**
 * Build the analysis prompt. When it exceeds `maxLength` the document text
 * is cut first; if that leaves too little room the whole prompt is cut.
 */
export function buildFinalPrompt(input: PromptInput, maxLength: number = PROMPT_MAX_LENGTH): string {
  const head = headLines(input.summary, input.items ?? []);
  const text = input.text ?? "";
  const full = render(head, text);
  if (full.length <= maxLength) return full;

  if (text) {
    const overhead = full.length - text.length;
    const room = maxLength - overhead - TEXT_CUT_MARKER.length;
    if (room > MIN_TEXT_ROOM) {
      const cut = truncate(text, room) + TEXT_CUT_MARKER;
      log.info({ before: full.length, textRoom: room }, "document text cut to fit prompt");
      return render(head, cut);
    }
  }

  log.warn({ before: full.length, maxLength }, "prompt cut to fit length limit");
  return full.slice(0, Math.max(0, maxLength - PROMPT_CUT_MARKER.length)) + PROMPT_CUT_MARKER;
}

/** Prompt from a pipeline result; a failed run contributes no text. */
export function buildPromptFromResult(
  summary: TenderSummary,
  items: TenderItem[],
  result: PipelineResult,
  opts: { maxTextLength?: number; maxLength?: number } = {},
): string {
  const text = result.success ? truncate(result.text, opts.maxTextLength ?? DEFAULT_MAX_CHARS) : "";
  return buildFinalPrompt({ summary, items, text }, opts.maxLength);
}
