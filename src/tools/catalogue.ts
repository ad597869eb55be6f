/**
 * Tool names by group, for --list-tools and get_service_info
 */

export const TOOL_CATALOGUE = {
  paperAnalysis: [
    ['analyze_paper_citations', 'Citations, references and recommendations for a paper'],
    ['search_papers_by_keywords', 'Keyword search on Semantic Scholar'],
    ['search_papers_by_author', 'Papers of the best matching author'],
    ['search_papers_by_field', 'Search within one field of study'],
    ['get_paper_details', 'Paper details with optional related papers'],
    ['batch_get_papers', 'Fetch many papers in one batch request'],
    ['get_paper_recommendations', 'Papers similar to a given paper']
  ],
  arxiv: [
    ['get_arxiv_paper', 'arXiv paper by id or URL'],
    ['search_arxiv_papers', 'Keyword search on arXiv'],
    ['search_arxiv_by_author', 'Newest arXiv papers of an author'],
    ['search_arxiv_by_category', 'Newest arXiv papers in a category']
  ],
  library: [
    ['save_paper_to_markdown', 'Save a Semantic Scholar paper as a markdown note'],
    ['save_arxiv_paper_to_markdown', 'Save an arXiv paper as a markdown note'],
    ['organize_papers_by_topic', 'Saved notes grouped by topic, with statistics'],
    ['generate_literature_review', 'Review of a topic organized by requirements'],
    ['create_requirement_based_review', 'Review of selected papers organized by requirements'],
    ['search_papers_in_collection', 'Keyword search over saved notes']
  ],
  pdfProcessing: [
    ['download_arxiv_pdf', 'Download the PDF of an arXiv paper'],
    ['extract_pdf_text', 'Extract text from a PDF file'],
    ['convert_pdf_to_text', 'Write the text of a PDF to a .txt file'],
    ['process_arxiv_paper', 'Download an arXiv PDF and extract its text']
  ],
  serviceInfo: [['get_service_info', 'Service information and tool list']]
} as const satisfies Record<string, ReadonlyArray<readonly [string, string]>>;

export type ToolGroup = keyof typeof TOOL_CATALOGUE;

const GROUP_HEADINGS: Record<ToolGroup, string> = {
  paperAnalysis: 'Paper analysis',
  arxiv: 'arXiv',
  library: 'Paper library',
  pdfProcessing: 'PDF processing',
  serviceInfo: 'Service'
};

const GROUPS: readonly ToolGroup[] = ['paperAnalysis', 'arxiv', 'library', 'pdfProcessing', 'serviceInfo'];

function toolsOf(group: ToolGroup): ReadonlyArray<readonly [string, string]> {
  return TOOL_CATALOGUE[group];
}

export function allToolNames(): string[] {
  return GROUPS.flatMap((group) => toolsOf(group).map(([name]) => name));
}

export function toolNamesByGroup(): Record<ToolGroup, string[]> {
  return {
    paperAnalysis: toolsOf('paperAnalysis').map(([name]) => name),
    arxiv: toolsOf('arxiv').map(([name]) => name),
    library: toolsOf('library').map(([name]) => name),
    pdfProcessing: toolsOf('pdfProcessing').map(([name]) => name),
    serviceInfo: toolsOf('serviceInfo').map(([name]) => name)
  };
}

/**
 * Human readable listing, one tool per line under each group heading
 */
export function formatToolList(): string {
  return GROUPS.map((group) => {
    const lines = toolsOf(group).map(([name, summary]) => `  ${name} - ${summary}`);
    return [`${GROUP_HEADINGS[group]}:`, ...lines].join('\n');
  }).join('\n\n');
}
