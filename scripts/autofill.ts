/**
 * Parse a resume, open the application page and fill the fields inside a form area.
 * The browser stays open afterwards: enter another form selector to fill it too,
 * or press Enter to close the browser once the page has been reviewed.
 *
 * Run: npm run autofill -- --url <application url> [--resume <file>] [--form <css selector>]
 *        [--config config.yaml] [--log-level debug]
 */
import './load-env.js';

import readline from 'readline';
import { parseArgs } from 'util';
import {
  AnswerGenerator,
  PlaywrightFieldFiller,
  PlaywrightFormFieldSource,
  autoFillForm,
  createLogger,
  fillFormAreas,
  findResumeFile,
  loadAutofillConfig,
  navigateTo,
  parseLogLevel,
  resumeParserAgent,
  setLogLevel,
  summarizeFillResults,
  withFormSession,
} from '@jobfill/agents';
import { OllamaClient } from '@jobfill/llm';

const log = createLogger('autofill');

function ask(question: string): Promise<string> {
  // Nothing to answer without a terminal; end the session
  if (!process.stdin.isTTY) return Promise.resolve('');

  return new Promise((resolve) => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

async function main() {
  const { values } = parseArgs({
    options: {
      resume: { type: 'string', short: 'r' },
      url: { type: 'string', short: 'u' },
      form: { type: 'string', short: 'f', default: 'form' },
      config: { type: 'string', short: 'c', default: 'config.yaml' },
      'log-level': { type: 'string' },
    },
  });

  const config = loadAutofillConfig({ configPath: values.config });
  setLogLevel(parseLogLevel(values['log-level']) ?? config.logging.level);

  if (!values.url) {
    log.error('Missing --url for the application page');
    process.exit(1);
  }

  const resumeFile = values.resume ?? (await findResumeFile(config.resumeParsing.resumeDir));
  if (!resumeFile) {
    log.error('No resume file specified or found. Use --resume or place a file in resumes/');
    process.exit(1);
  }

  const parsed = await resumeParserAgent.execute({
    filePath: resumeFile,
    outputFile: config.resumeParsing.outputFile,
  });
  if (!parsed.success || !parsed.data) {
    log.error(`Error parsing resume: ${parsed.error}`);
    process.exit(1);
  }
  const resume = parsed.data;

  const llmReady = await new OllamaClient(config.llm.baseUrl).isAvailable(config.llm.model);
  if (!llmReady) {
    log.warn(`Model ${config.llm.model} not available at ${config.llm.baseUrl}; open questions get canned answers`);
  }
  const url = values.url;
  const formSelector = values.form ?? 'form';

  const areas = await withFormSession(config.browser, async (page) => {
    await navigateTo(page, url);
    const filler = new PlaywrightFieldFiller(page, config.automation);
    const answers = new AnswerGenerator(config.llm);

    return fillFormAreas(formSelector, {
      fillArea: async (areaSelector) => {
        const results = await autoFillForm(new PlaywrightFormFieldSource(page, areaSelector), resume, {
          filler,
          answers,
          onProgress: (message) => log.info(message),
        });

        for (const line of summarizeFillResults(results).lines) {
          if (line.startsWith('  - ')) log.warn(line);
          else log.info(line);
        }
        return results;
      },
      nextArea: () =>
        ask('Review the page. Enter another form selector to fill, or press Enter to close the browser: '),
    });
  });

  process.exit(areas.every(({ results }) => results.success) ? 0 : 1);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
