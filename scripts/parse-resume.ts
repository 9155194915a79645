/**
 * Parse a resume file and write the JSON snapshot.
 *
 * Run: npm run parse-resume -- <resume.pdf|.docx> [--out parsed_resume.json] [--config config.yaml]
 */
import './load-env.js';

import { parseArgs } from 'util';
import {
  findResumeFile,
  loadAutofillConfig,
  resumeParserAgent,
  setLogLevel,
} from '@jobfill/agents';

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      config: { type: 'string', short: 'c', default: 'config.yaml' },
    },
  });

  const config = loadAutofillConfig({ configPath: values.config });
  setLogLevel(config.logging.level);

  const filePath = positionals[0] ?? (await findResumeFile(config.resumeParsing.resumeDir));
  if (!filePath) {
    console.error(`No resume file given and none found in ${config.resumeParsing.resumeDir}/`);
    process.exit(1);
  }

  const result = await resumeParserAgent.execute({
    filePath,
    outputFile: values.out ?? config.resumeParsing.outputFile,
  });

  if (!result.success || !result.data) {
    console.error('Resume parsing failed:', result.error);
    process.exit(1);
  }

  const { personalInfo, education, workExperience, skills, projects } = result.data;
  console.log(
    JSON.stringify(
      {
        name: personalInfo.name ?? null,
        email: personalInfo.email ?? null,
        education: education.length,
        workExperience: workExperience.length,
        skills: skills.length,
        projects: projects.length,
      },
      null,
      2,
    ),
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
