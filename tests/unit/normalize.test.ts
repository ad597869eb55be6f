import { describe, expect, it } from 'vitest';

import { renameFields, ResponseNormalizer } from '../../src/services/normalize.js';
import { atomEntry, atomFeed, rawPaper, silentLogger } from '../helpers.js';

const normalizer = new ResponseNormalizer(silentLogger);

describe('ResponseNormalizer', () => {
  describe('paper', () => {
    it('maps Semantic Scholar keys onto the canonical record', () => {
      const paper = normalizer.paper(rawPaper());

      expect(paper).toEqual({
        id: 'abc123',
        title: 'Graph Attention Networks',
        abstract: 'We present graph attention networks, a neural architecture for graph data.',
        authors: [
          { id: '1', name: 'Ada Lovelace' },
          { id: '2', name: 'Alan Turing' }
        ],
        year: 2018,
        venue: 'ICLR',
        url: 'https://www.semanticscholar.org/paper/abc123',
        citationCount: 5,
        referenceCount: 12,
        influentialCitationCount: 1,
        arxivId: '1710.10903',
        doi: '10.1000/gat',
        corpusId: null,
        externalIds: { ArXiv: '1710.10903', DOI: '10.1000/gat' },
        publicationTypes: [],
        publicationDate: null,
        journal: null,
        tldr: null,
        embedding: null
      });
    });

    it('survives a JSON round trip unchanged', () => {
      const paper = normalizer.paper({ paperId: 'X', citationCount: 5 });

      expect(paper?.id).toBe('X');
      expect(paper?.citationCount).toBe(5);
      expect(JSON.parse(JSON.stringify(paper))).toEqual(paper);
    });

    it('fills defaults for missing and null values', () => {
      const paper = normalizer.paper({ paperId: 'p1', title: null, citationCount: null, venue: '' });

      expect(paper?.title).toBe('');
      expect(paper?.citationCount).toBe(0);
      expect(paper?.venue).toBeNull();
      expect(paper?.authors).toEqual([]);
      expect(paper?.externalIds).toEqual({});
    });

    it('converts numeric identifiers to strings', () => {
      expect(normalizer.paper({ paperId: 42 })?.id).toBe('42');
    });

    it('reads tldr text, journal and embedding', () => {
      const paper = normalizer.paper({
        paperId: 'p2',
        tldr: { model: 'tldr@v2', text: 'Short summary.' },
        journal: { name: 'Nature', volume: '7', pages: '1-9' },
        embedding: { model: 'specter@v0.1.1', vector: [0.5, -0.25] }
      });

      expect(paper?.tldr).toBe('Short summary.');
      expect(paper?.journal).toEqual({ name: 'Nature', volume: '7', pages: '1-9' });
      expect(paper?.embedding).toEqual({ model: 'specter@v0.1.1', vector: [0.5, -0.25] });
    });

    it('drops authors without a name', () => {
      const paper = normalizer.paper({
        paperId: 'p3',
        authors: [{ authorId: '9' }, { authorId: null, name: 'Anonymous' }, 'junk']
      });

      expect(paper?.authors).toEqual([{ id: null, name: 'Anonymous' }]);
    });

    it('rejects payloads without a paper id', () => {
      expect(normalizer.paper({ title: 'No id' })).toBeNull();
      expect(normalizer.paper({ paperId: '' })).toBeNull();
      expect(normalizer.paper('not an object')).toBeNull();
      expect(normalizer.paper(null)).toBeNull();
    });
  });

  describe('author', () => {
    it('maps author keys and keeps absent counts as null', () => {
      const author = normalizer.author({
        authorId: '1741101',
        name: 'Ada Lovelace',
        affiliations: ['Analytical Engine Society'],
        hIndex: 12
      });

      expect(author).toEqual({
        id: '1741101',
        name: 'Ada Lovelace',
        aliases: [],
        affiliations: ['Analytical Engine Society'],
        homepage: null,
        paperCount: null,
        citationCount: null,
        hIndex: 12
      });
    });

    it('rejects authors without id', () => {
      expect(normalizer.author({ name: 'Nobody' })).toBeNull();
    });
  });

  describe('searchResult', () => {
    it('reads the envelope and skips unusable entries', () => {
      const result = normalizer.searchResult({
        total: 2,
        offset: 0,
        next: 10,
        data: [rawPaper(), { title: 'Missing id' }]
      });

      expect(result?.total).toBe(2);
      expect(result?.offset).toBe(0);
      expect(result?.nextOffset).toBe(10);
      expect(result?.papers.map((paper) => paper.id)).toEqual(['abc123']);
    });

    it('defaults an empty envelope', () => {
      expect(normalizer.searchResult({})).toEqual({ total: 0, offset: 0, nextOffset: null, papers: [] });
    });

    it('returns null for a body that is not an object', () => {
      expect(normalizer.searchResult('<html>')).toBeNull();
    });
  });

  describe('arxivFeed', () => {
    it('parses every entry of an Atom feed', () => {
      const papers = normalizer.arxivFeed(
        atomFeed([atomEntry('2301.00001v1', 'First   Paper'), atomEntry('2301.00002v2', 'Second Paper')])
      );

      expect(papers).toHaveLength(2);
      expect(papers[0]).toEqual({
        id: '2301.00001v1',
        title: 'First Paper',
        authors: ['Grace Hopper', 'Edsger Dijkstra'],
        abstract: 'An abstract spread over lines.',
        publishedDate: '2023-01-02T10:00:00Z',
        pdfUrl: 'http://arxiv.org/pdf/2301.00001v1',
        categories: ['cs.LG', 'cs.AI']
      });
      expect(papers[1].id).toBe('2301.00002v2');
    });

    it('fills defaults for an entry with only a title', () => {
      const papers = normalizer.arxivFeed(atomFeed(['<entry><title>Only Title</title></entry>']));

      expect(papers).toEqual([
        {
          id: '',
          title: 'Only Title',
          authors: [],
          abstract: '',
          publishedDate: '',
          pdfUrl: '',
          categories: []
        }
      ]);
    });

    it('returns no papers for malformed XML', () => {
      expect(normalizer.arxivFeed('<feed><entry>')).toEqual([]);
    });

    it('returns no papers for a feed without entries', () => {
      expect(normalizer.arxivFeed(atomFeed([]))).toEqual([]);
    });
  });

  describe('arxivDocument', () => {
    it('takes the first entry', () => {
      const paper = normalizer.arxivDocument(atomFeed([atomEntry('2301.00003v1', 'Third Paper')]));

      expect(paper?.id).toBe('2301.00003v1');
      expect(paper?.title).toBe('Third Paper');
    });

    it('returns null for malformed XML', () => {
      expect(normalizer.arxivDocument('<entry><title>broken')).toBeNull();
    });
  });
});

describe('renameFields', () => {
  it('keeps only mapped keys under their new names', () => {
    expect(renameFields({ paperId: 'a', extra: 1, title: 't' }, { paperId: 'id', title: 'title' })).toEqual({
      id: 'a',
      title: 't'
    });
  });
});
