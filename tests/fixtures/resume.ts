import type { ResumeDocument } from '@jobfill/agents';

export const SAMPLE_RESUME_TEXT = `Jane Doe
jane.doe@example.com | 555-123-4567
linkedin.com/in/jane-doe | github.com/janedoe

Education
B.S. Computer Science
State University
2019

Experience
Software Engineer
Acme Inc
2019 - Present

Projects
Resume Parser
Extracts structured data from resumes
Form Bot
Fills application forms

Skills
Python, TypeScript; Go|C++
Docker • Kubernetes`;

export const makeResume = (overrides?: Partial<ResumeDocument>): ResumeDocument => ({
  personalInfo: {
    name: 'Jane Doe',
    email: 'jane@example.com',
    phone: '555-123-4567',
    linkedin: 'linkedin.com/in/janedoe',
    github: 'github.com/janedoe',
  },
  education: [{ degree: 'B.S. Computer Science', institution: 'State University', year: '2019' }],
  workExperience: [{ position: 'Software Engineer', company: 'Acme Inc', duration: '2019 - Present' }],
  skills: ['Python', 'TypeScript', 'Go', 'C++', 'Docker', 'Kubernetes'],
  projects: [{ name: 'Form Bot', description: 'Fills application forms' }],
  rawText: '',
  ...overrides,
});
