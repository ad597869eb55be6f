/**
 * Paper Manager
 *
 * Markdown notes on disk, one directory per topic:
 *
 *   <mdFilesDir>/<topic>/<title>.md
 *
 * Also writes timestamped JSON snapshots of analysis results.
 */

import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';

import { describeError } from '../errors.js';
import type { ArxivPaper, Paper } from '../models.js';
import { fileTimestamp, formatAuthors, formatTimestamp, sanitizeFilename } from '../utils.js';

export const DEFAULT_TOPIC = 'general';

const MAX_TITLE_LENGTH = 100;

export interface PaperManagerOptions {
  mdFilesDir: string;
  jsonFilesDir: string;
  /** Clock for footers and file names */
  now?: () => Date;
}

export interface CollectionMatch {
  topic: string;
  filename: string;
  filepath: string;
}

export interface CollectionStatistics {
  totalPapers: number;
  papersByTopic: Record<string, number>;
  topics: string[];
}

export interface TopicNote {
  filename: string;
  content: string;
}

export class PaperManager {
  readonly mdFilesDir: string;
  readonly jsonFilesDir: string;
  readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: PaperManagerOptions, logger: Logger) {
    this.mdFilesDir = options.mdFilesDir;
    this.jsonFilesDir = options.jsonFilesDir;
    this.now = options.now ?? (() => new Date());
    this.logger = logger.child({ component: 'paper-manager' });
  }

  /**
   * Directory of a topic; names that would escape the library fall back to
   * the default topic
   */
  topicDir(topic: string): string {
    const name = sanitizeFilename(topic);
    const safe = name === '' || name === '.' || name === '..' ? DEFAULT_TOPIC : name;
    return path.join(this.mdFilesDir, safe);
  }

  async savePaper(paper: Paper, topic = DEFAULT_TOPIC, notes = ''): Promise<string> {
    this.logger.debug({ title: paper.title, topic }, 'Saving paper to markdown');
    return this.writeNote(paper.title || paper.id, topic, this.renderPaper(paper, notes));
  }

  async saveArxivPaper(paper: ArxivPaper, topic = DEFAULT_TOPIC, notes = ''): Promise<string> {
    this.logger.debug({ title: paper.title, topic }, 'Saving arXiv paper to markdown');
    return this.writeNote(paper.title || paper.id, topic, this.renderArxivPaper(paper, notes));
  }

  /**
   * Topic name -> note file names
   */
  async organizeByTopic(): Promise<Record<string, string[]>> {
    const organized: Record<string, string[]> = {};
    for (const topic of await this.listTopics()) {
      organized[topic] = await this.listNotes(path.join(this.mdFilesDir, topic));
    }
    return organized;
  }

  /**
   * Notes whose content contains `keyword`, case-insensitively
   */
  async searchByKeyword(keyword: string): Promise<CollectionMatch[]> {
    const needle = keyword.toLowerCase();
    const matches: CollectionMatch[] = [];

    for (const topic of await this.listTopics()) {
      const dir = path.join(this.mdFilesDir, topic);
      for (const filename of await this.listNotes(dir)) {
        const filepath = path.join(dir, filename);
        try {
          const content = await readFile(filepath, 'utf-8');
          if (content.toLowerCase().includes(needle)) {
            matches.push({ topic, filename, filepath });
          }
        } catch (error) {
          this.logger.warn({ filepath, error: describeError(error) }, 'Skipping unreadable note');
        }
      }
    }

    return matches;
  }

  async getStatistics(): Promise<CollectionStatistics> {
    const stats: CollectionStatistics = { totalPapers: 0, papersByTopic: {}, topics: [] };

    for (const [topic, notes] of Object.entries(await this.organizeByTopic())) {
      stats.papersByTopic[topic] = notes.length;
      stats.totalPapers += notes.length;
      stats.topics.push(topic);
    }
    return stats;
  }

  /**
   * Contents of every note in a topic, or null when the topic directory did
   * not exist (it is created)
   */
  async readTopicNotes(topic: string): Promise<TopicNote[] | null> {
    const dir = this.topicDir(topic);
    const created = await mkdir(dir, { recursive: true });
    if (created !== undefined) {
      this.logger.debug({ topic }, 'Created missing topic directory');
      return null;
    }

    const notes: TopicNote[] = [];
    for (const filename of await this.listNotes(dir)) {
      notes.push({ filename, content: await readFile(path.join(dir, filename), 'utf-8') });
    }
    return notes;
  }

  /**
   * Write `content` as a top-level document of the library (reviews)
   */
  async writeDocument(filename: string, content: string): Promise<string> {
    await mkdir(this.mdFilesDir, { recursive: true });
    const filepath = path.join(this.mdFilesDir, sanitizeFilename(filename));
    await writeFile(filepath, content, 'utf-8');
    this.logger.debug({ filepath }, 'Document saved');
    return filepath;
  }

  /**
   * Pretty-printed JSON snapshot, prefixed with a timestamp
   */
  async saveJson(data: unknown, filename: string): Promise<string> {
    await mkdir(this.jsonFilesDir, { recursive: true });
    const filepath = path.join(this.jsonFilesDir, `${fileTimestamp(this.now())}_${sanitizeFilename(filename)}`);
    await writeFile(filepath, JSON.stringify(data, null, 2), 'utf-8');
    return filepath;
  }

  renderPaper(paper: Paper, notes = ''): string {
    let content = `# ${paper.title}

## Metadata
- **Paper ID**: ${paper.id}
- **Authors**: ${formatAuthors(paper.authors)}
- **Year**: ${paper.year ?? 'Unknown'}
- **Venue**: ${paper.venue || 'Unknown'}
- **Citation Count**: ${paper.citationCount}
- **Reference Count**: ${paper.referenceCount}
- **Influential Citations**: ${paper.influentialCitationCount}

## Links
`;

    if (paper.url) {
      content += `- **Paper URL**: ${paper.url}\n`;
    }
    if (paper.arxivId) {
      content += `- **ArXiv**: https://arxiv.org/abs/${paper.arxivId}\n`;
    }
    if (paper.doi) {
      content += `- **DOI**: https://doi.org/${paper.doi}\n`;
    }

    content += '\n## Abstract\n\n';
    content += paper.abstract || 'No abstract available.';

    if (paper.tldr) {
      content += `\n\n## TL;DR\n\n${paper.tldr}`;
    }
    if (notes) {
      content += `\n\n## Notes\n\n${notes}`;
    }

    content += '\n\n## External IDs\n\n';
    for (const [key, value] of Object.entries(paper.externalIds)) {
      content += `- **${key}**: ${value}\n`;
    }

    content += `\n\n---\n*Saved on ${formatTimestamp(this.now())}*\n`;
    return content;
  }

  renderArxivPaper(paper: ArxivPaper, notes = ''): string {
    let content = `# ${paper.title}

## Metadata
- **ArXiv ID**: ${paper.id}
- **Authors**: ${paper.authors.length ? paper.authors.join(', ') : 'Unknown'}
- **Published**: ${paper.publishedDate}
- **Categories**: ${paper.categories.length ? paper.categories.join(', ') : 'Unknown'}

## Links
- **ArXiv**: https://arxiv.org/abs/${paper.id}
- **PDF**: ${paper.pdfUrl}

## Abstract

${paper.abstract || 'No abstract available.'}
`;

    if (notes) {
      content += `\n\n## Notes\n\n${notes}`;
    }

    content += `\n\n---\n*Saved on ${formatTimestamp(this.now())}*\n`;
    return content;
  }

  private async writeNote(title: string, topic: string, content: string): Promise<string> {
    const dir = this.topicDir(topic);
    await mkdir(dir, { recursive: true });

    const filename = `${sanitizeFilename(title.slice(0, MAX_TITLE_LENGTH)) || 'untitled'}.md`;
    const filepath = path.join(dir, filename);
    await writeFile(filepath, content, 'utf-8');

    this.logger.debug({ filepath }, 'Paper saved');
    return filepath;
  }

  private async listTopics(): Promise<string[]> {
    await mkdir(this.mdFilesDir, { recursive: true });
    const entries = await readdir(this.mdFilesDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  }

  private async listNotes(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith('.md'))
      .map((entry) => entry.name)
      .sort();
  }
}
