import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { PaperManager } from '../../src/services/paperManager.js';
import {
  LiteratureReviewService,
  matchesRequirement,
  requirementKeywords,
  titleCase
} from '../../src/services/reviews.js';
import { FIXED_NOW, makeTempDir, removeDir, samplePaper, silentLogger } from '../helpers.js';

describe('review helpers', () => {
  it('splits requirements into lower-cased words', () => {
    expect(requirementKeywords('  Graph   Neural Networks ')).toEqual(['graph', 'neural', 'networks']);
  });

  it('matches when any word of the requirement occurs', () => {
    expect(matchesRequirement('A survey of GRAPH methods', 'graph transformers')).toBe(true);
    expect(matchesRequirement('Protein folding', 'graph transformers')).toBe(false);
  });

  it('capitalizes every word of a topic', () => {
    expect(titleCase('machine_learning')).toBe('Machine_Learning');
    expect(titleCase('deep RL')).toBe('Deep Rl');
  });
});

describe('LiteratureReviewService', () => {
  let root: string;
  let mdDir: string;
  let papers: PaperManager;
  let reviews: LiteratureReviewService;

  beforeEach(async () => {
    root = await makeTempDir();
    mdDir = path.join(root, 'md');
    papers = new PaperManager(
      { mdFilesDir: mdDir, jsonFilesDir: path.join(root, 'json'), now: () => FIXED_NOW },
      silentLogger
    );
    reviews = new LiteratureReviewService(papers, silentLogger);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe('generateTopicReview', () => {
    beforeEach(async () => {
      const topicDir = path.join(mdDir, 'machine_learning');
      await mkdir(topicDir, { recursive: true });
      await writeFile(
        path.join(topicDir, 'a.md'),
        '# Graph Networks Survey\n\nSee https://arxiv.org/abs/2301.00001v1 for deep learning on graphs.\n',
        'utf-8'
      );
      await writeFile(path.join(topicDir, 'b.md'), '# Quantum Chemistry\n\nNo link here.\n', 'utf-8');
    });

    it('groups the notes of a topic by requirement', async () => {
      const result = await reviews.generateTopicReview(
        'machine_learning',
        ['graph networks', 'quantum chemistry methods'],
        'review.md'
      );

      expect(result).toEqual({ status: 'created', filepath: path.join(mdDir, 'review.md'), paperCount: 2 });
      expect(await readFile(path.join(mdDir, 'review.md'), 'utf-8')).toBe(
        [
          '# Literature Review: Machine_Learning',
          '',
          '*Generated on 2024-03-05 14:07:09*',
          '',
          '## Overview',
          '',
          'This literature review covers 2 papers in the machine_learning domain, organized according to the following requirements:',
          '',
          '1. graph networks',
          '2. quantum chemistry methods',
          '',
          '## Papers by Requirements',
          '',
          '### Requirement 1: graph networks',
          '',
          '#### Graph Networks Survey',
          '- ArXiv Link: `https://arxiv.org/abs/2301.00001v1`',
          '- Key Features: Advanced research in the field',
          '- Technologies: Learning, Deep',
          '',
          '### Requirement 2: quantum chemistry methods',
          '',
          '#### Quantum Chemistry',
          '- ArXiv Link: `Unknown`',
          '- Key Features: Advanced research in the field',
          '- Technologies: Machine Learning',
          '',
          '## Summary',
          '',
          'This review analyzed 2 papers across 2 requirements.',
          '',
          '## All Papers Reviewed',
          '',
          '- Graph Networks Survey',
          '- Quantum Chemistry',
          ''
        ].join('\n')
      );
    });

    it('notes requirements without matching papers', async () => {
      await reviews.generateTopicReview('machine_learning', ['astronomy'], 'review.md');

      const content = await readFile(path.join(mdDir, 'review.md'), 'utf-8');
      expect(content).toContain('### Requirement 1: astronomy\n\nNo papers found matching this requirement.\n\n## Summary');
    });

    it('names the review after the topic and time by default', async () => {
      const result = await reviews.generateTopicReview('machine_learning', ['graph']);

      expect(result).toEqual({
        status: 'created',
        filepath: path.join(mdDir, 'literature_review_machine_learning_20240305_140709.md'),
        paperCount: 2
      });
    });

    it('creates a missing topic and reports it', async () => {
      const result = await reviews.generateTopicReview('robotics', ['grasping']);

      expect(result).toEqual({
        status: 'topic_created',
        message: "Topic directory 'robotics' was created but contains no papers yet."
      });
      expect(await papers.organizeByTopic()).toHaveProperty('robotics', []);
    });

    it('reports a topic without notes', async () => {
      await mkdir(path.join(mdDir, 'empty'), { recursive: true });

      expect(await reviews.generateTopicReview('empty', ['anything'])).toEqual({
        status: 'empty',
        message: "No papers found in topic 'empty'."
      });
    });
  });

  describe('createRequirementReview', () => {
    const robots = samplePaper({
      id: 'p1',
      title: 'Deep Reinforcement Learning for Robots',
      abstract: 'We apply reinforcement learning to language-guided robots.',
      arxivId: '2301.00010'
    });
    const folding = samplePaper({
      id: 'p2',
      title: 'Protein Folding',
      abstract: null,
      arxivId: null,
      url: 'https://example.org/p2'
    });

    it('lists matching papers under each requirement', async () => {
      const filepath = await reviews.createRequirementReview([robots, folding], ['reinforcement robots', 'protein']);

      expect(filepath).toBe(path.join(mdDir, 'requirement_review_20240305_140709.md'));
      expect(await readFile(filepath, 'utf-8')).toBe(
        [
          '# Literature Review',
          '',
          '*Generated on 2024-03-05 14:07:09*',
          '',
          '## Overview',
          '',
          'This review analyzes 2 papers according to the specified requirements.',
          '',
          '## Requirement 1: reinforcement robots',
          '',
          '### Deep Reinforcement Learning for Robots',
          '- ArXiv Link: `https://arxiv.org/abs/2301.00010`',
          '- Key Features: We apply reinforcement learning to language-guided robots....',
          '- Technologies: NLP, Reinforcement Learning, Machine Learning, Deep Learning',
          '',
          '## Requirement 2: protein',
          '',
          '### Protein Folding',
          '- ArXiv Link: `https://example.org/p2`',
          '- Key Features: Advanced research methodology',
          '- Technologies: Machine Learning, Deep Learning',
          '',
          '## Papers Matching Multiple Requirements',
          '',
          ''
        ].join('\n')
      );
    });

    it('lists papers that match several requirements', async () => {
      const both = samplePaper({ id: 'p3', title: 'Protein Robots', abstract: null, arxivId: null, url: null });

      const filepath = await reviews.createRequirementReview([both], ['protein', 'robots'], 'multi.md');

      const content = await readFile(filepath, 'utf-8');
      expect(content.endsWith(
        [
          '## Papers Matching Multiple Requirements',
          '',
          '### Protein Robots',
          '- ArXiv Link: `Unknown`',
          '- Key Features: Comprehensive research approach',
          '- Technologies: Multi-domain Machine Learning',
          '',
          ''
        ].join('\n')
      )).toBe(true);
    });

    it('has no multiple-requirement section for a single requirement', async () => {
      const filepath = await reviews.createRequirementReview([robots], ['robots'], 'single.md');

      expect(await readFile(filepath, 'utf-8')).not.toContain('## Papers Matching Multiple Requirements');
    });

    it('cuts long abstracts to a preview', () => {
      const content = reviews.renderRequirementReview(
        [samplePaper({ abstract: 'a'.repeat(150) })],
        ['graph'],
        FIXED_NOW
      );

      expect(content).toContain(`- Key Features: ${'a'.repeat(100)}...\n`);
    });
  });
});
