import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { PaperManager } from '../../src/services/paperManager.js';
import {
  FIXED_NOW,
  makeTempDir,
  removeDir,
  sampleArxivPaper,
  samplePaper,
  silentLogger
} from '../helpers.js';

describe('PaperManager', () => {
  let root: string;
  let mdDir: string;
  let jsonDir: string;
  let manager: PaperManager;

  beforeEach(async () => {
    root = await makeTempDir();
    mdDir = path.join(root, 'md');
    jsonDir = path.join(root, 'json');
    manager = new PaperManager({ mdFilesDir: mdDir, jsonFilesDir: jsonDir, now: () => FIXED_NOW }, silentLogger);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe('savePaper', () => {
    it('writes the paper note under its topic', async () => {
      const paper = samplePaper({ tldr: 'Attention on graphs.' });

      const filepath = await manager.savePaper(paper, 'machine_learning', 'Read later');

      expect(filepath).toBe(path.join(mdDir, 'machine_learning', 'Graph Attention Networks.md'));
      expect(await readFile(filepath, 'utf-8')).toBe(
        [
          '# Graph Attention Networks',
          '',
          '## Metadata',
          '- **Paper ID**: abc123',
          '- **Authors**: Ada Lovelace, Alan Turing',
          '- **Year**: 2018',
          '- **Venue**: ICLR',
          '- **Citation Count**: 5',
          '- **Reference Count**: 12',
          '- **Influential Citations**: 1',
          '',
          '## Links',
          '- **Paper URL**: https://www.semanticscholar.org/paper/abc123',
          '- **ArXiv**: https://arxiv.org/abs/1710.10903',
          '- **DOI**: https://doi.org/10.1000/gat',
          '',
          '## Abstract',
          '',
          'We present graph attention networks, a neural architecture for graph data.',
          '',
          '## TL;DR',
          '',
          'Attention on graphs.',
          '',
          '## Notes',
          '',
          'Read later',
          '',
          '## External IDs',
          '',
          '- **ArXiv**: 1710.10903',
          '- **DOI**: 10.1000/gat',
          '',
          '',
          '---',
          '*Saved on 2024-03-05 14:07:09*',
          ''
        ].join('\n')
      );
    });

    it('uses defaults for missing metadata', async () => {
      const content = manager.renderPaper(
        samplePaper({
          abstract: null,
          authors: [],
          year: null,
          venue: null,
          url: null,
          arxivId: null,
          doi: null,
          externalIds: {}
        })
      );

      expect(content).toContain('- **Authors**: Unknown\n- **Year**: Unknown\n- **Venue**: Unknown\n');
      expect(content).toContain('## Links\n\n## Abstract\n\nNo abstract available.\n\n## External IDs\n\n\n\n---');
      expect(content).not.toContain('## TL;DR');
      expect(content).not.toContain('## Notes');
    });

    it('saves to the general topic by default', async () => {
      const filepath = await manager.savePaper(samplePaper());

      expect(filepath).toBe(path.join(mdDir, 'general', 'Graph Attention Networks.md'));
    });

    it('sanitizes and truncates the file name', async () => {
      const filepath = await manager.savePaper(samplePaper({ title: 'What/Why: A <Study>?' }), 'ml');
      expect(path.basename(filepath)).toBe('What_Why_ A _Study__.md');

      const long = await manager.savePaper(samplePaper({ title: 'x'.repeat(150) }), 'ml');
      expect(path.basename(long)).toBe(`${'x'.repeat(100)}.md`);
    });

    it('keeps topic names inside the library', () => {
      expect(manager.topicDir('..')).toBe(path.join(mdDir, 'general'));
      expect(manager.topicDir('a/b')).toBe(path.join(mdDir, 'a_b'));
    });
  });

  it('writes arXiv notes', async () => {
    const filepath = await manager.saveArxivPaper(sampleArxivPaper(), 'transformers');

    expect(filepath).toBe(path.join(mdDir, 'transformers', 'Attention Is Everywhere.md'));
    expect(await readFile(filepath, 'utf-8')).toBe(
      [
        '# Attention Is Everywhere',
        '',
        '## Metadata',
        '- **ArXiv ID**: 2301.00001v1',
        '- **Authors**: Grace Hopper, Edsger Dijkstra',
        '- **Published**: 2023-01-02T10:00:00Z',
        '- **Categories**: cs.LG, cs.AI',
        '',
        '## Links',
        '- **ArXiv**: https://arxiv.org/abs/2301.00001v1',
        '- **PDF**: http://arxiv.org/pdf/2301.00001v1',
        '',
        '## Abstract',
        '',
        'An abstract.',
        '',
        '',
        '---',
        '*Saved on 2024-03-05 14:07:09*',
        ''
      ].join('\n')
    );
  });

  describe('collection', () => {
    beforeEach(async () => {
      await manager.savePaper(samplePaper({ title: 'Graph Attention Networks' }), 'ml');
      await manager.saveArxivPaper(sampleArxivPaper({ title: 'Attention Is Everywhere' }), 'ml');
      await manager.savePaper(samplePaper({ title: 'Protein Folding', abstract: 'Structure prediction.' }), 'bio');
      await writeFile(path.join(mdDir, 'ml', 'scratch.txt'), 'attention', 'utf-8');
    });

    it('groups notes by topic', async () => {
      expect(await manager.organizeByTopic()).toEqual({
        bio: ['Protein Folding.md'],
        ml: ['Attention Is Everywhere.md', 'Graph Attention Networks.md']
      });
    });

    it('counts notes per topic', async () => {
      expect(await manager.getStatistics()).toEqual({
        totalPapers: 3,
        papersByTopic: { bio: 1, ml: 2 },
        topics: ['bio', 'ml']
      });
    });

    it('searches note contents case-insensitively', async () => {
      const matches = await manager.searchByKeyword('STRUCTURE PREDICTION');

      expect(matches).toEqual([
        {
          topic: 'bio',
          filename: 'Protein Folding.md',
          filepath: path.join(mdDir, 'bio', 'Protein Folding.md')
        }
      ]);
    });

    it('finds nothing for an unknown keyword', async () => {
      expect(await manager.searchByKeyword('zebrafish')).toEqual([]);
    });
  });

  it('reports an empty library', async () => {
    expect(await manager.organizeByTopic()).toEqual({});
    expect(await manager.getStatistics()).toEqual({ totalPapers: 0, papersByTopic: {}, topics: [] });
  });

  describe('readTopicNotes', () => {
    it('creates a missing topic and reports it', async () => {
      expect(await manager.readTopicNotes('fresh')).toBeNull();
      expect(await manager.readTopicNotes('fresh')).toEqual([]);
    });

    it('reads every note of a topic in name order', async () => {
      await mkdir(path.join(mdDir, 'ml'), { recursive: true });
      await writeFile(path.join(mdDir, 'ml', 'b.md'), '# B', 'utf-8');
      await writeFile(path.join(mdDir, 'ml', 'a.md'), '# A', 'utf-8');

      expect(await manager.readTopicNotes('ml')).toEqual([
        { filename: 'a.md', content: '# A' },
        { filename: 'b.md', content: '# B' }
      ]);
    });
  });

  it('writes documents at the library root', async () => {
    const filepath = await manager.writeDocument('reviews/latest.md', '# Review');

    expect(filepath).toBe(path.join(mdDir, 'reviews_latest.md'));
    expect(await readFile(filepath, 'utf-8')).toBe('# Review');
  });

  it('saves timestamped JSON snapshots', async () => {
    const filepath = await manager.saveJson({ paperId: 'abc123', total: 2 }, 'analysis.json');

    expect(filepath).toBe(path.join(jsonDir, '20240305_140709_analysis.json'));
    expect(await readFile(filepath, 'utf-8')).toBe('{\n  "paperId": "abc123",\n  "total": 2\n}');
  });
});
