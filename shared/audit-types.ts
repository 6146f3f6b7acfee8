export interface CheckResult<T = undefined> {
  passed: boolean;
  message: string;
  data?: T;
}

export interface RobotsGroupSummary {
  agents: string[];
  allows: string[];
  disallows: string[];
}

export interface RobotsCheckData {
  statusCode: number | null;
  wildcardBlocked: boolean;
  botSpecificDisallows: string[];
}

export interface AltTextData {
  totalImages: number;
  missingAlt: number;
  emptyAlt: number;
}

export interface StructuredDataRichness {
  typesFound: string[];
  llmFriendlyTypes: string[];
  totalSchemas: number;
  invalidBlocks: number;
  richnessScore: number;
}

export interface ReadabilityMetrics {
  fleschKincaidGrade: number;
  fleschReadingEase: number;
  gunningFogIndex: number;
  wordCount: number;
  sentenceCount: number;
  avgSentenceLength: number;
  readabilityScore: number;
}

export interface InsufficientContentData {
  wordCount: number;
}

export interface AccessibilityTriage {
  easilyReadable: {
    headings: number;
    paragraphs: number;
    lists: number;
    textContentLength: number;
    altTextImages: number;
    structuredData: number;
  };
  challenging: {
    tables: number;
    forms: number;
    iframes: number;
    imagesWithoutAlt: number;
  };
  inaccessible: {
    canvasElements: number;
    svgElements: number;
    mediaElements: number;
    javascriptDependent: number;
  };
  llmReadinessScore: number;
}

export interface InventoryItem {
  type: string;
  details: string;
}

export interface AccessibilityReport {
  accessibleContent: {
    textElements: InventoryItem[];
    structuredData: InventoryItem[];
    semanticElements: InventoryItem[];
    accessibleMedia: InventoryItem[];
  };
  challengingContent: {
    complexStructures: InventoryItem[];
    interactiveElements: InventoryItem[];
    partiallyAccessible: InventoryItem[];
  };
  inaccessibleContent: {
    visualOnly: InventoryItem[];
    javascriptDependent: InventoryItem[];
    multimediaWithoutText: InventoryItem[];
    embeddedContent: InventoryItem[];
  };
  recommendations: string[];
}

export interface PageHeading {
  level: number;
  text: string;
}

export interface ImageWithContext {
  altText: string;
  src: string;
  context: string;
}

export interface LinkWithContext {
  text: string;
  url: string;
  context: string;
}

export interface ListContent {
  type: "ordered" | "unordered";
  items: string[];
}

/** What a text-only crawler sees on a page. */
export interface LlmView {
  title: string;
  metaDescription: string | null;
  headings: PageHeading[];
  mainContent: string;
  structuredData: unknown[];
  imagesWithContext: ImageWithContext[];
  linksWithContext: LinkWithContext[];
  tablesContent: string[][][];
  listsContent: ListContent[];
  richnessScore: number;
}

export interface PageChecks {
  robots_txt_allows_crawling: CheckResult<RobotsCheckData>;
  meta_robots_allows_indexing: CheckResult;
  has_h1_tag: CheckResult<{ h1Count: number }>;
  has_meta_description: CheckResult<{ length: number }>;
  images_have_alt_text: CheckResult<AltTextData>;
  structured_data_richness: CheckResult<StructuredDataRichness>;
  content_readability: CheckResult<ReadabilityMetrics | InsufficientContentData>;
  llm_content_analysis: CheckResult<AccessibilityTriage>;
  llm_accessibility_analysis: CheckResult<AccessibilityReport>;
  llm_content_richness: CheckResult<LlmView>;
}

export type CheckName = keyof PageChecks;

export interface LlmContentSummary {
  title: string;
  headingsCount: number;
  mainContentWords: number;
  imagesWithAlt: number;
  structuredSchemas: number;
  richnessScore: number;
}

export interface ContentAnalysis {
  readabilityScore: number;
  structuredDataRichness: number;
  structuredSchemasCount: number;
  llmContentSummary: LlmContentSummary;
}

export interface PageScoreResult {
  url: string;
  /** False when the page could not be fetched; its checks are then all failed. */
  accessible: boolean;
  score: number;
  checks: PageChecks;
  contentAnalysis: ContentAnalysis;
}

export interface Recommendations {
  critical: string[];
  important: string[];
  suggested: string[];
}

export interface AccessibilityBreakdown {
  high: number;
  medium: number;
  low: number;
}

export interface ContentAnalysisSummary {
  avgReadabilityScore: number;
  avgStructuredDataRichness: number;
  totalStructuredSchemas: number;
  pagesWithGoodReadability: number;
}

/** Counts cover accessible pages only; unreachable pages are tallied separately. */
export interface TechnicalIssues {
  inaccessiblePages: number;
  robotsBlocked: number;
  metaNoindex: number;
  missingH1: number;
  missingMetaDescription: number;
  missingAltText: number;
  noStructuredData: number;
}

export interface LlmReadinessSummary {
  accessibilityBreakdown: AccessibilityBreakdown;
  contentAnalysis: ContentAnalysisSummary;
  technicalIssues: TechnicalIssues;
}

export interface DuplicateGroup {
  similarityScore: number;
  urls: string[];
}

export interface DuplicateContentData {
  duplicateGroups: DuplicateGroup[];
  pageUrls: string[];
  totalDuplicates: number;
}

export interface WebsitePageSummary {
  url: string;
  title: string;
  h1Headings: string[];
  h2Headings: string[];
  metaDescription: string;
  mainContent: string;
  imagesCount: number;
  imagesWithAlt: number;
  contentLength: number;
}

export interface WebsiteContent {
  domain: string;
  totalPages: number;
  pages: WebsitePageSummary[];
}

export type AiInsights =
  | {
      success: true;
      analysis: string;
      recommendations: string[];
      contentSummary: WebsiteContent;
    }
  | {
      success: false;
      error: string;
    };

export interface SiteResult {
  pages: PageScoreResult[];
  siteScore: number;
  recommendations: Recommendations;
  llmReadinessSummary: LlmReadinessSummary;
  duplicateContent: CheckResult<DuplicateContentData>;
  aiAnalysis?: AiInsights;
}
