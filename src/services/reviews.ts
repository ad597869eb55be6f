/**
 * Literature reviews
 *
 * Markdown review documents built by plain keyword matching: a note or paper
 * belongs to a requirement when it contains any word of that requirement.
 */

import type { Logger } from 'pino';

import type { Paper } from '../models.js';
import { fileTimestamp, formatTimestamp } from '../utils.js';
import type { PaperManager, TopicNote } from './paperManager.js';

export type TopicReviewResult =
  | { status: 'created'; filepath: string; paperCount: number }
  | { status: 'topic_created' | 'empty'; message: string };

const TECH_KEYWORDS: ReadonlyArray<[needle: string, label: string]> = [
  ['learning', 'Learning'],
  ['neural', 'Neural'],
  ['deep', 'Deep'],
  ['machine', 'Machine'],
  ['ai', 'AI'],
  ['algorithm', 'Algorithm'],
  ['model', 'Model']
];

const ARXIV_LINK = /https?:\/\/arxiv\.org\/abs\/[^\s`)\]]+/;

const FEATURE_PREVIEW_LENGTH = 100;

export function requirementKeywords(requirement: string): string[] {
  return requirement.toLowerCase().split(/\s+/).filter(Boolean);
}

/**
 * True when `text` contains any word of `requirement`, case-insensitively
 */
export function matchesRequirement(text: string, requirement: string): boolean {
  const haystack = text.toLowerCase();
  return requirementKeywords(requirement).some((keyword) => haystack.includes(keyword));
}

/**
 * "machine_learning" -> "Machine_Learning"
 */
export function titleCase(text: string): string {
  return text.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function noteTitle(note: TopicNote): string {
  const [firstLine] = note.content.split('\n');
  return firstLine ? firstLine.replace('# ', '') : note.filename;
}

function noteTechnologies(content: string): string {
  const haystack = content.toLowerCase();
  const found = TECH_KEYWORDS.filter(([needle]) => haystack.includes(needle)).map(([, label]) => label);
  return found.length ? found.slice(0, 3).join(', ') : 'Machine Learning';
}

function paperLink(paper: Paper): string {
  return paper.arxivId ? `https://arxiv.org/abs/${paper.arxivId}` : paper.url || 'Unknown';
}

function paperText(paper: Paper): string {
  return `${paper.title} ${paper.abstract ?? ''}`;
}

function paperTechnologies(paper: Paper): string {
  let technologies = 'Machine Learning, Deep Learning';
  const abstract = paper.abstract?.toLowerCase();
  if (abstract) {
    if (abstract.includes('reinforcement')) {
      technologies = `Reinforcement Learning, ${technologies}`;
    }
    if (abstract.includes('nlp') || abstract.includes('language')) {
      technologies = `NLP, ${technologies}`;
    }
  }
  return technologies;
}

function entry(heading: string, title: string, link: string, features: string, technologies: string): string {
  return `${heading} ${title}
- ArXiv Link: \`${link}\`
- Key Features: ${features}
- Technologies: ${technologies}

`;
}

export class LiteratureReviewService {
  private readonly logger: Logger;

  constructor(
    private readonly papers: PaperManager,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'reviews' });
  }

  /**
   * Review of the notes saved under `topic`, written to the library root
   */
  async generateTopicReview(
    topic: string,
    requirements: string[],
    outputFilename?: string
  ): Promise<TopicReviewResult> {
    this.logger.debug({ topic, requirements: requirements.length }, 'Generating literature review');

    const notes = await this.papers.readTopicNotes(topic);
    if (notes === null) {
      return {
        status: 'topic_created',
        message: `Topic directory '${topic}' was created but contains no papers yet.`
      };
    }
    if (notes.length === 0) {
      return { status: 'empty', message: `No papers found in topic '${topic}'.` };
    }

    const now = this.papers.now();
    const filename = outputFilename || `literature_review_${topic}_${fileTimestamp(now)}.md`;
    const filepath = await this.papers.writeDocument(filename, this.renderTopicReview(topic, requirements, notes, now));

    this.logger.info({ filepath, papers: notes.length }, 'Literature review saved');
    return { status: 'created', filepath, paperCount: notes.length };
  }

  /**
   * Review of already fetched papers grouped by requirement
   */
  async createRequirementReview(papers: Paper[], requirements: string[], outputFilename?: string): Promise<string> {
    this.logger.debug({ papers: papers.length, requirements: requirements.length }, 'Creating requirement review');

    const now = this.papers.now();
    const filename = outputFilename || `requirement_review_${fileTimestamp(now)}.md`;
    const filepath = await this.papers.writeDocument(
      filename,
      this.renderRequirementReview(papers, requirements, now)
    );

    this.logger.info({ filepath, papers: papers.length }, 'Requirement review saved');
    return filepath;
  }

  renderTopicReview(topic: string, requirements: string[], notes: TopicNote[], now: Date): string {
    let content = `# Literature Review: ${titleCase(topic)}

*Generated on ${formatTimestamp(now)}*

## Overview

This literature review covers ${notes.length} papers in the ${topic} domain, organized according to the following requirements:

`;

    requirements.forEach((requirement, index) => {
      content += `${index + 1}. ${requirement}\n`;
    });

    content += '\n## Papers by Requirements\n\n';

    requirements.forEach((requirement, index) => {
      content += `### Requirement ${index + 1}: ${requirement}\n\n`;

      const matching = notes.filter((note) => matchesRequirement(note.content, requirement));
      if (matching.length === 0) {
        content += 'No papers found matching this requirement.\n\n';
        return;
      }

      for (const note of matching) {
        const link = note.content.match(ARXIV_LINK)?.[0] ?? 'Unknown';
        content += entry('####', noteTitle(note), link, 'Advanced research in the field', noteTechnologies(note.content));
      }
    });

    content += '## Summary\n\n';
    content += `This review analyzed ${notes.length} papers across ${requirements.length} requirements.\n\n`;

    content += '## All Papers Reviewed\n\n';
    for (const note of notes) {
      content += `- ${noteTitle(note)}\n`;
    }

    return content;
  }

  renderRequirementReview(papers: Paper[], requirements: string[], now: Date): string {
    let content = `# Literature Review

*Generated on ${formatTimestamp(now)}*

## Overview

This review analyzes ${papers.length} papers according to the specified requirements.

`;

    requirements.forEach((requirement, index) => {
      content += `## Requirement ${index + 1}: ${requirement}\n\n`;

      for (const paper of papers.filter((candidate) => matchesRequirement(paperText(candidate), requirement))) {
        const features = paper.abstract
          ? `${paper.abstract.slice(0, FEATURE_PREVIEW_LENGTH)}...`
          : 'Advanced research methodology';
        content += entry('###', paper.title, paperLink(paper), features, paperTechnologies(paper));
      }
    });

    if (requirements.length > 1) {
      content += '## Papers Matching Multiple Requirements\n\n';

      const multiMatch = papers.filter(
        (paper) => requirements.filter((requirement) => matchesRequirement(paperText(paper), requirement)).length >= 2
      );
      for (const paper of multiMatch) {
        const features = paper.abstract
          ? `${paper.abstract.slice(0, FEATURE_PREVIEW_LENGTH)}...`
          : 'Comprehensive research approach';
        content += entry('###', paper.title, paperLink(paper), features, 'Multi-domain Machine Learning');
      }
    }

    return content;
  }
}
