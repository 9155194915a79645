/**
 * Playwright adapters for the fill loop: a scoped browser session, field
 * collection inside a form area, and per-field filling.
 *
 * LLM Usage: None (pure Playwright automation)
 */

import { chromium, firefox, webkit, type Page } from 'playwright';
import type { AutomationConfig, BrowserConfig } from '../shared/config.js';
import { createLogger } from '../shared/logger.js';
import { FormFieldSchema, type FieldFiller, type FormField, type FormFieldSource } from './types.js';

const log = createLogger('Playwright');

const LAUNCHERS = { chromium, firefox, webkit };

const CHROMIUM_ARGS = [
  '--disable-gpu',
  '--disable-dev-shm-usage',
  '--disable-setuid-sandbox',
  '--no-sandbox',
];

/**
 * Launch a browser, hand a fresh page to `fn`, and close the browser afterwards.
 */
export async function withFormSession<T>(
  config: BrowserConfig,
  fn: (page: Page) => Promise<T>,
): Promise<T> {
  const browser = await LAUNCHERS[config.browserType].launch({
    headless: config.headless,
    args: config.browserType === 'chromium' ? CHROMIUM_ARGS : undefined,
  });
  log.info(`Browser started: ${config.browserType}`);

  try {
    const context = await browser.newContext({ viewport: config.viewport });
    const page = await context.newPage();
    return await fn(page);
  } finally {
    await browser.close();
    log.info('Browser closed');
  }
}

export async function navigateTo(page: Page, url: string): Promise<void> {
  await page.goto(url);
  await page.waitForLoadState('networkidle');
  log.info(`Navigated to: ${url}`);
}

/** select elements report "select-one" / "select-multiple" */
export function normalizeFieldType(type: string): string {
  const lower = type.toLowerCase();
  return lower.startsWith('select') ? 'select' : lower;
}

/**
 * `tag[name="..."]` with the value quoted for a CSS attribute selector.
 */
export function nameSelector(tag: string, name: string): string {
  const quoted = name.replace(/["\\]/g, '\\$&').replace(/\n/g, '\\a ');
  return `${tag}[name="${quoted}"]`;
}

export class PlaywrightFormFieldSource implements FormFieldSource {
  constructor(
    private readonly page: Page,
    private readonly areaSelector: string,
  ) {}

  async getFormFields(): Promise<FormField[]> {
    const area = this.page.locator(this.areaSelector).first();
    await area.waitFor({ state: 'attached', timeout: 10000 });

    const raw = await area.locator('input, textarea, select').evaluateAll((elements) =>
      elements.map((el) => {
        const control =
          el instanceof HTMLInputElement ||
          el instanceof HTMLTextAreaElement ||
          el instanceof HTMLSelectElement
            ? el
            : null;
        const tag = el.tagName.toLowerCase();
        const rect = el.getBoundingClientRect();
        const name = control?.name ?? '';
        const label =
          el.closest('label') ??
          (el.id ? document.querySelector(`label[for="${CSS.escape(el.id)}"]`) : null) ??
          el.previousElementSibling;

        return {
          type: control?.type || tag,
          label: label?.textContent?.trim() ?? '',
          placeholder:
            control instanceof HTMLInputElement || control instanceof HTMLTextAreaElement
              ? control.placeholder
              : '',
          name,
          id: el.id,
          value: control?.value ?? '',
          required: control?.required ?? false,
          visible: rect.width > 0 && rect.height > 0,
          tag,
          idSelector: el.id ? `#${CSS.escape(el.id)}` : '',
        };
      }),
    );

    return raw.map(({ tag, idSelector, ...field }) =>
      FormFieldSchema.parse({
        ...field,
        type: normalizeFieldType(field.type),
        selector: idSelector || nameSelector(tag, field.name),
      }),
    );
  }
}

const TEXT_INPUT_TYPES = new Set([
  'text',
  'email',
  'tel',
  'password',
  'textarea',
  'url',
  'number',
  'search',
]);

const CHECKED_VALUES = ['yes', 'true', '1', 'on', 'checked'];

export class PlaywrightFieldFiller implements FieldFiller {
  constructor(
    private readonly page: Page,
    private readonly automation: AutomationConfig,
  ) {}

  private async pause(): Promise<void> {
    await new Promise((r) => setTimeout(r, this.automation.actionDelay));
  }

  async fillField(selector: string, value: string, fieldType: string): Promise<boolean> {
    try {
      await this.pause();

      const element = this.page.locator(selector).first();
      await element.waitFor({ state: 'attached', timeout: 5000 });
      await element.scrollIntoViewIfNeeded();
      await this.pause();

      if (TEXT_INPUT_TYPES.has(fieldType)) {
        await element.click();
        await element.fill('');
        await this.pause();
        await element.pressSequentially(value, { delay: this.automation.typingDelay });
      } else if (fieldType === 'radio') {
        if (!(await this.selectRadioOption(selector, value))) {
          log.warn(`No radio option matching "${value}" for ${selector}`);
          return false;
        }
      } else if (fieldType === 'checkbox') {
        await element.setChecked(CHECKED_VALUES.includes(value.trim().toLowerCase()));
      } else if (fieldType === 'select') {
        await element.selectOption(value);
      } else {
        log.warn(`Unsupported field type "${fieldType}" for ${selector}`);
        return false;
      }

      log.info(`Filled field ${selector} with value: ${value.slice(0, 50)}...`);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error(`Error filling field ${selector}: ${message}`);
      return false;
    }
  }

  private async selectRadioOption(selector: string, value: string): Promise<boolean> {
    const wanted = value.toLowerCase();

    for (const radio of await this.page.locator(selector).all()) {
      const labelText = await radio.evaluate((el) => {
        const label =
          el.closest('label') ??
          (el.id ? document.querySelector(`label[for="${CSS.escape(el.id)}"]`) : null) ??
          el.nextElementSibling;
        return label?.textContent?.trim().toLowerCase() ?? '';
      });

      if (labelText && (wanted.includes(labelText) || labelText.includes(wanted))) {
        await radio.click();
        return true;
      }
    }

    return false;
  }
}
