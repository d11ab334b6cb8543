import fs from 'fs';
import path from 'path';
import { ClassificationResult } from '../classification/pipeline';
import { LabeledPost, PercentileThreshold } from '../classification/types';
import { logger } from '../utils/logger';

export const DEFAULT_OUTPUT_DIR = path.join(__dirname, '..', '..', 'output');

/** One row of the labeled table, in the warehouse column naming. */
export interface ExportRow {
  account_id: string;
  post_id: string | null;
  posted_at: string | null;
  likes: number;
  views: number;
  comments: number;
  duration: number;
  caption: string;
  post_url: string | null;
  post_number: number;
  avg_last_50: number | null;
  viral: 0 | 1;
}

export interface FinalDeliverable {
  generatedAt: string;
  options: ClassificationResult['options'];
  summary: ClassificationResult['summary'];
  thresholds: ClassificationResult['thresholds'];
  excludedWithoutAccount: number;
  droppedBelowMinPosts: number;
  rows: ExportRow[];
}

export interface SavedOutputs {
  jsonPath: string;
  markdownPath: string;
}

export function toExportRow(post: LabeledPost): ExportRow {
  return {
    account_id: post.accountId,
    post_id: post.postId,
    posted_at: post.postedAt ? post.postedAt.toISOString() : null,
    likes: post.likes,
    views: post.views,
    comments: post.comments,
    duration: post.duration,
    caption: post.caption,
    post_url: post.postUrl,
    post_number: post.postNumber,
    avg_last_50: post.avgLast50,
    viral: post.viral ? 1 : 0,
  };
}

export function toExportRows(posts: readonly LabeledPost[]): ExportRow[] {
  return posts.map(toExportRow);
}

export function formatOutput(result: ClassificationResult, generatedAt: Date = new Date()): FinalDeliverable {
  return {
    generatedAt: generatedAt.toISOString(),
    options: result.options,
    summary: result.summary,
    thresholds: result.thresholds,
    excludedWithoutAccount: result.excludedWithoutAccount,
    droppedBelowMinPosts: result.droppedBelowMinPosts,
    rows: toExportRows(result.posts),
  };
}

function formatThreshold(label: string, value: PercentileThreshold): string {
  const threshold = value.threshold === null ? 'n/a' : String(value.threshold);
  return `| ${label} | ${threshold} | ${value.topCount} | ${value.sampleSize} |\n`;
}

export function generateSummaryMarkdown(deliverable: FinalDeliverable): string {
  const { summary, options, thresholds } = deliverable;

  let md = `# Viral Labeling Summary\n\n`;
  md += `**Generated:** ${deliverable.generatedAt}\n\n`;
  md += `**Window:** ${options.windowSize} posts (${options.windowDirection}) | `;
  md += `**Multiplier:** ${options.viralMultiplier} | `;
  md += `**Cap:** ${options.maxPostsPerAccount} posts/account\n\n`;
  md += `---\n\n`;

  md += `## Labels\n\n`;
  md += `- Accounts: ${summary.accounts}\n`;
  md += `- Posts: ${summary.totalPosts}\n`;
  md += `- Viral: ${summary.viralPosts}\n`;
  md += `- Non-viral: ${summary.nonViralPosts}\n`;
  md += `- Without look-ahead estimate: ${summary.postsWithoutEstimate}\n`;
  if (deliverable.excludedWithoutAccount > 0) {
    md += `- Excluded (no account id): ${deliverable.excludedWithoutAccount}\n`;
  }
  md += `\n`;

  if (thresholds) {
    md += `## Top ${Math.round(options.topFraction * 100)}% Thresholds\n\n`;
    md += `| Dataset | Threshold | Top posts | Posts |\n`;
    md += `|---|---|---|---|\n`;
    md += formatThreshold('Ad', thresholds.ad);
    md += formatThreshold('Organic', thresholds.organic);
    md += `\n`;
  }

  return md;
}

export function saveOutputs(deliverable: FinalDeliverable, outputDir: string = DEFAULT_OUTPUT_DIR): SavedOutputs {
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  const date = deliverable.generatedAt.split('T')[0];

  const jsonPath = path.join(outputDir, `labeled-${date}.json`);
  fs.writeFileSync(jsonPath, JSON.stringify(deliverable, null, 2));
  logger.success(`Saved: ${jsonPath}`);

  const markdownPath = path.join(outputDir, `summary-${date}.md`);
  fs.writeFileSync(markdownPath, generateSummaryMarkdown(deliverable));
  logger.success(`Saved: ${markdownPath}`);

  return { jsonPath, markdownPath };
}
