import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { ExportError, InvalidInputError } from '../errors/index.js';
import { writeOutput } from './writer.js';
import { DEFAULT_PAGE_TITLE, DEFAULT_QUESTION } from '../schemas/config.js';

const DEFAULT_TEMPLATE_PATH = fileURLToPath(
  new URL('../../templates/annotation-page.html', import.meta.url)
);

export interface PageOptions {
  title?: string;
  question?: string;
  templatePath?: string;
}

const PLACEHOLDERS = {
  title: '@@PAGE_TITLE@@',
  question: '@@QUESTION@@',
  slots: '@@CONVO_SLOTS@@',
  answers: '@@ANSWER_INPUTS@@',
} as const;

// Indentation of the placeholders inside the template's <form>
const INDENT = '\n        ';

function hostField(column: string): string {
  return `{{ task.row_data['${column}'] }}`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function renderSlot(slot: number): string {
  return [
    `<div class="convo-slot" data-slot="${slot}" style="display:none">`,
    `    <div class="convo-id">${hostField(`id${slot}`)}</div>`,
    `    <div class="convo-title">${hostField(`title${slot}`)}</div>`,
    `    <div class="convo-text">${hostField(`convo${slot}`)}</div>`,
    `</div>`,
  ].join(INDENT);
}

export function renderAnswerInput(slot: number): string {
  return `<input type="hidden" name="answer_convo${slot}" id="answer_convo${slot}" value="">`;
}

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i + 1);
}

function loadTemplate(templatePath: string): string {
  if (!existsSync(templatePath)) {
    throw new ExportError(`Page template not found: ${templatePath}`, templatePath);
  }
  const template = readFileSync(templatePath, 'utf-8');
  for (const placeholder of Object.values(PLACEHOLDERS)) {
    if (!template.includes(placeholder)) {
      throw new ExportError(`Page template is missing ${placeholder}`, templatePath);
    }
  }
  return template;
}

/**
 * Render the annotation page for rows of `batchSize` conversations.
 *
 * The page carries one hidden slot per conversation (id, title, text) for the
 * hosting platform to fill from a CSV row, and one hidden `answer_convo<i>`
 * input per slot that the platform reads back as the row's result.
 */
export function renderPage(batchSize: number, options: PageOptions = {}): string {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new InvalidInputError(`Batch size must be a positive integer (got ${batchSize})`);
  }

  const template = loadTemplate(options.templatePath ?? DEFAULT_TEMPLATE_PATH);
  const slots = range(batchSize).map(renderSlot).join(INDENT);
  const answers = range(batchSize).map(renderAnswerInput).join(INDENT);

  // split/join rather than replace(): replacement strings must not treat $ specially
  return template
    .split(PLACEHOLDERS.title).join(escapeHtml(options.title ?? DEFAULT_PAGE_TITLE))
    .split(PLACEHOLDERS.question).join(escapeHtml(options.question ?? DEFAULT_QUESTION))
    .split(PLACEHOLDERS.slots).join(slots)
    .split(PLACEHOLDERS.answers).join(answers);
}

export function writePage(batchSize: number, path: string, options: PageOptions = {}): void {
  writeOutput(path, renderPage(batchSize, options));
}
