/**
 * @fileoverview Documentation Agent - maps the documentation of a repository.
 *
 * A thin agent on top of the loop controller. It scans for documentation
 * files, reads README files first, searches for the topic named in the goal
 * and finally asks for a summary of what it read. It reports completion
 * through an insight carrying a completion marker, so the default goal
 * test ends the loop.
 *
 * @module explorer/agent/documentation-agent
 * @version 0.1.0
 */

import { z } from 'zod';
import * as path from 'path';
import { ActionKind, createAction } from '../types/core.types.js';
import type { Action, LoopState, LoopStateView, Observation } from '../types/core.types.js';
import { Logger, createLogger } from '../observability/logger.js';
import { BaseExplorationAgent } from './agent.js';

const DOC_EXTENSIONS = ['.md', '.rst', '.txt', '.adoc', '.wiki'];
const DOC_KEYWORDS = ['doc', 'readme', 'manual', 'guide', 'help', 'license', 'changelog', 'contributing'];
const DOC_FILE_TYPES = ['.md', '.rst', '.txt'];

/** Goal words that trigger a targeted search, in priority order */
const GOAL_TOPICS = ['api', 'architecture', 'install', 'setup', 'usage'];

/**
 * Coarse category of a documentation file.
 */
export type DocumentType =
  | 'readme'
  | 'api'
  | 'architecture'
  | 'installation'
  | 'usage'
  | 'contributing'
  | 'changelog'
  | 'license'
  | 'general';

export interface DocumentHeading {
  readonly level: number;
  readonly title: string;
  readonly line: number;
}

/**
 * Structure extracted from one documentation file.
 */
export interface DocumentAnalysis {
  readonly filePath: string;
  readonly type: DocumentType;
  readonly headings: ReadonlyArray<DocumentHeading>;
  readonly codeBlocks: number;
  readonly links: number;
  readonly wordCount: number;
  readonly lineCount: number;
  readonly topics: {
    readonly installation: boolean;
    readonly usage: boolean;
    readonly api: boolean;
    readonly architecture: boolean;
  };
}

export interface DocumentationAgentOptions {
  /** Analysed documents after which the agent reports completion */
  readonly targetDocuments?: number;
  /** Line limit for each read */
  readonly maxLinesPerRead?: number;
  readonly logger?: Logger;
}

// Result shapes the agent reacts to; anything else is ignored.
const ScanResultSchema = z.object({
  contents: z.array(z.object({ path: z.string(), isDirectory: z.boolean() })),
});
const ListResultSchema = z.object({
  files: z.array(z.object({ path: z.string() })),
});
const ReadResultSchema = z.object({
  filePath: z.string(),
  content: z.string(),
});
const SearchResultSchema = z.object({
  results: z.array(z.object({ filePath: z.string() })),
});
const SummaryResultSchema = z.object({
  summary: z.string(),
});

/**
 * Explores documentation files.
 *
 * @example
 * ```typescript
 * const agent = new DocumentationAgent({ targetDocuments: 5 });
 * const result = await executeLoop(
 *   { agent, repository: new LocalRepository('.') },
 *   'Explain the install steps',
 * );
 * console.log(agent.getAnalyzedDocuments().map(d => d.filePath));
 * ```
 */
export class DocumentationAgent extends BaseExplorationAgent {
  readonly name = 'DocumentationAgent';

  private readonly targetDocuments: number;
  private readonly maxLinesPerRead: number;
  private readonly logger: Logger;

  private foundDocs: string[] = [];
  private analyzedDocs = new Map<string, DocumentAnalysis>();
  private insights: string[] = [];
  private searchedTopics = new Set<string>();
  private attemptedReads = new Set<string>();
  private scanned = false;
  private listed = false;

  constructor(options: DocumentationAgentOptions = {}) {
    super();
    this.targetDocuments = options.targetDocuments ?? 3;
    this.maxLinesPerRead = options.maxLinesPerRead ?? 200;
    this.logger = options.logger ?? createLogger('documentation-agent');
  }

  /**
   * Starts a fresh exploration on the first iteration of each loop.
   */
  reason(state: LoopStateView): string {
    if (state.iteration <= 1) {
      this.reset();
      return 'Start by scanning the repository structure to find documentation files.';
    }
    if (this.foundDocs.length === 0 && !this.listed) {
      return 'No documentation found yet. List markdown files across the repository.';
    }
    if (this.nextUnreadDocument() !== null && !this.hasEnoughDocuments()) {
      return `Found ${this.foundDocs.length} documentation files. Read the most important unread one, README files first.`;
    }
    if (this.nextTopic(state.goal) !== null && !this.hasEnoughDocuments()) {
      return 'Search for documentation about the topic named in the goal.';
    }
    return 'Summarise what the documentation says.';
  }

  planAction(state: LoopStateView): Action {
    if (!this.scanned) {
      this.scanned = true;
      return createAction(
        ActionKind.SCAN_DIRECTORY,
        'Scan repository for documentation files',
        { directory: '.', maxDepth: 3 },
        { expectedOutcome: 'Documentation files and directory structure' },
      );
    }

    if (this.foundDocs.length === 0 && !this.listed) {
      this.listed = true;
      return createAction(
        ActionKind.LIST_FILES,
        'List markdown files',
        { pattern: '.md', directory: '.' },
        { expectedOutcome: 'Markdown files anywhere in the repository' },
      );
    }

    const unread = this.nextUnreadDocument();
    if (unread !== null && !this.hasEnoughDocuments()) {
      this.attemptedReads.add(unread);
      return createAction(
        ActionKind.READ_FILE,
        `Read documentation file: ${unread}`,
        { filePath: unread, maxLines: this.maxLinesPerRead },
        { expectedOutcome: 'Structure and topics of the document' },
      );
    }

    const topic = this.nextTopic(state.goal);
    if (topic !== null && !this.hasEnoughDocuments()) {
      this.searchedTopics.add(topic);
      return createAction(
        ActionKind.SEARCH_FILES,
        `Search documentation for "${topic}"`,
        { pattern: topic, fileTypes: DOC_FILE_TYPES, maxResults: 10 },
        { expectedOutcome: `Documents mentioning ${topic}` },
      );
    }

    return createAction(
      ActionKind.LLM_SUMMARY,
      'Summarise documentation findings',
      {
        content: this.outline(),
        summaryType: 'documentation',
        focus: firstTopic(state.goal) ?? 'all',
      },
      { expectedOutcome: 'Short summary of the documentation' },
    );
  }

  override observe(state: LoopState, observation: Observation): void {
    super.observe(state, observation);
    if (!observation.success) {
      return;
    }

    const { result } = observation;

    const scan = ScanResultSchema.safeParse(result);
    if (scan.success) {
      scan.data.contents
        .filter(entry => !entry.isDirectory)
        .forEach(entry => this.addDocument(entry.path, 'scan'));
      return;
    }

    const list = ListResultSchema.safeParse(result);
    if (list.success) {
      list.data.files.forEach(file => this.addDocument(file.path, 'listing'));
      return;
    }

    const read = ReadResultSchema.safeParse(result);
    if (read.success) {
      this.recordAnalysis(analyzeDocument(read.data.filePath, read.data.content));
      if (this.hasEnoughDocuments()) {
        state.observations.push(
          `Documentation analysis completed: ${this.analyzedDocs.size} documents analysed`,
        );
      }
      return;
    }

    const search = SearchResultSchema.safeParse(result);
    if (search.success) {
      search.data.results.forEach(hit => this.addDocument(hit.filePath, 'search'));
      return;
    }

    const summary = SummaryResultSchema.safeParse(result);
    if (summary.success) {
      state.currentContext['documentation_summary'] = summary.data.summary;
      state.observations.push(
        `Documentation analysis completed: ${this.analyzedDocs.size} documents analysed`,
      );
    }
  }

  generateSummary(state: LoopStateView): string {
    if (this.foundDocs.length === 0) {
      return 'No documentation files found in the repository.';
    }

    const lines = [
      'Documentation analysis summary:',
      `- Found ${this.foundDocs.length} documentation files`,
      `- Analysed ${this.analyzedDocs.size} files in detail`,
      `- Generated ${this.insights.length} insights`,
    ];

    if (this.analyzedDocs.size > 0) {
      const counts = new Map<DocumentType, number>();
      for (const analysis of this.analyzedDocs.values()) {
        counts.set(analysis.type, (counts.get(analysis.type) ?? 0) + 1);
      }
      const types = [...counts].map(([type, count]) => `${type} (${count})`).join(', ');
      lines.push(`- Document types: ${types}`);
    }
    if (state.cacheHits > 0) {
      lines.push(`- Cache hits: ${state.cacheHits}`);
    }
    if (state.errorCount > 0) {
      lines.push(`- Errors encountered: ${state.errorCount}`);
    }

    return lines.join('\n');
  }

  getFoundDocuments(): ReadonlyArray<string> {
    return [...this.foundDocs];
  }

  getAnalyzedDocuments(): ReadonlyArray<DocumentAnalysis> {
    return [...this.analyzedDocs.values()];
  }

  getInsights(): ReadonlyArray<string> {
    return [...this.insights];
  }

  // ============ Private Methods ============

  private reset(): void {
    this.foundDocs = [];
    this.analyzedDocs = new Map();
    this.insights = [];
    this.searchedTopics = new Set();
    this.attemptedReads = new Set();
    this.scanned = false;
    this.listed = false;
  }

  private hasEnoughDocuments(): boolean {
    return this.analyzedDocs.size >= this.targetDocuments;
  }

  private addDocument(filePath: string, source: string): void {
    if (!isDocumentationFile(filePath) || this.foundDocs.includes(filePath)) {
      return;
    }
    this.foundDocs.push(filePath);
    this.logger.info('Found documentation', { filePath, source });
  }

  private nextUnreadDocument(): string | null {
    const unread = this.foundDocs.filter(doc => !this.attemptedReads.has(doc));
    const readme = unread.find(doc => path.posix.basename(doc).toLowerCase().includes('readme'));
    return readme ?? unread[0] ?? null;
  }

  private nextTopic(goal: string): string | null {
    const lowered = goal.toLowerCase();
    return GOAL_TOPICS.find(topic => lowered.includes(topic) && !this.searchedTopics.has(topic)) ?? null;
  }

  private recordAnalysis(analysis: DocumentAnalysis): void {
    this.analyzedDocs.set(analysis.filePath, analysis);
    this.insights.push(...documentInsights(analysis));
    this.logger.info('Analysed documentation', {
      filePath: analysis.filePath,
      type: analysis.type,
      headings: analysis.headings.length,
    });
  }

  /**
   * Headings of every analysed document followed by the insights.
   */
  private outline(): string {
    const headings = [...this.analyzedDocs.values()]
      .flatMap(analysis => analysis.headings.map(h => `${'#'.repeat(h.level)} ${h.title}`));
    return [...headings, ...this.insights].join('\n');
  }
}

// ============ Helpers ============

/**
 * True when a path looks like documentation.
 */
export function isDocumentationFile(filePath: string): boolean {
  const lowered = filePath.toLowerCase();
  return (
    DOC_EXTENSIONS.some(ext => lowered.endsWith(ext)) ||
    DOC_KEYWORDS.some(keyword => lowered.includes(keyword))
  );
}

/**
 * Classifies a document by its path first, then by its content.
 */
export function classifyDocument(filePath: string, content: string): DocumentType {
  const p = filePath.toLowerCase();
  const c = content.toLowerCase();

  if (p.includes('readme')) return 'readme';
  if (p.includes('api') || c.includes('api')) return 'api';
  if (p.includes('architecture') || c.includes('architecture')) return 'architecture';
  if (p.includes('install') || c.includes('setup')) return 'installation';
  if (p.includes('usage') || c.includes('example')) return 'usage';
  if (p.includes('contributing')) return 'contributing';
  if (p.includes('changelog')) return 'changelog';
  if (p.includes('license')) return 'license';
  return 'general';
}

/**
 * Extracts headings, code blocks, links and topic flags.
 */
export function analyzeDocument(filePath: string, content: string): DocumentAnalysis {
  const lines = content.split('\n');
  const headings: DocumentHeading[] = [];

  lines.forEach((line, index) => {
    const match = /^\s*(#+)\s*(.*)$/.exec(line);
    if (match) {
      headings.push({ level: match[1].length, title: match[2].trim(), line: index + 1 });
    }
  });

  const lowered = content.toLowerCase();
  const words = content.split(/\s+/).filter(word => word.length > 0);

  return {
    filePath,
    type: classifyDocument(filePath, content),
    headings,
    codeBlocks: (content.match(/```[\s\S]*?```/g) ?? []).length,
    links: (content.match(/\[[^\]]*\]\([^)]*\)/g) ?? []).length,
    wordCount: words.length,
    lineCount: lines.length,
    topics: {
      installation: lowered.includes('install'),
      usage: lowered.includes('usage') || lowered.includes('example'),
      api: lowered.includes('api'),
      architecture: lowered.includes('architecture') || lowered.includes('design'),
    },
  };
}

/**
 * One-line findings about an analysed document.
 */
export function documentInsights(analysis: DocumentAnalysis): string[] {
  const { filePath, topics } = analysis;
  const insights = [`${filePath}: ${analysis.type} documentation`];

  if (analysis.headings.length > 0) {
    insights.push(`${filePath}: ${analysis.headings.length} sections`);
  }
  if (analysis.codeBlocks > 0) {
    insights.push(`${filePath}: ${analysis.codeBlocks} code examples`);
  }

  const score = [topics.installation, topics.usage, topics.api, topics.architecture]
    .filter(Boolean).length;
  insights.push(`${filePath}: completeness ${score}/4`);

  return insights;
}

function firstTopic(goal: string): string | null {
  const lowered = goal.toLowerCase();
  return GOAL_TOPICS.find(topic => lowered.includes(topic)) ?? null;
}
