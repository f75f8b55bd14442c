import * as cheerio from "cheerio";

/** Raw email as handed to the pipeline (pasted text, a file, or a job payload). */
export interface EmailInput {
  /** Plain-text body. */
  content?: string;
  /** HTML body; used when no plain text is given. */
  html?: string;
  sender?: string;
  subject?: string;
}

export interface NormalizedEmail {
  from: string;
  subject: string;
  bodyPlain: string;
  bodyHtml: string;
  /** Text for the LLM (plain body, else text extracted from HTML). */
  bodyText: string;
}

const MAX_BODY_CHARS = 25_000;

export function emptyEmail(): NormalizedEmail {
  return { from: "", subject: "", bodyPlain: "", bodyHtml: "", bodyText: "" };
}

function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $("script, style").remove();
  return $.root().text().replace(/[ \t]+\n/g, "\n").replace(/\n{3,}/g, "\n\n").trim();
}

/** Normalize email input with cheerio; produce the record the extractor reads. */
export function normalizeEmail(input: EmailInput): NormalizedEmail {
  const bodyPlain = (input.content ?? "").trim();
  const bodyHtml = input.html ?? "";
  const bodyText = bodyPlain || (bodyHtml ? htmlToText(bodyHtml) : "");
  return {
    from: (input.sender ?? "").trim(),
    subject: (input.subject ?? "").trim(),
    bodyPlain,
    bodyHtml,
    bodyText: bodyText.slice(0, MAX_BODY_CHARS),
  };
}
