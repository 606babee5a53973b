/**
 * Abandon analysis processor - Orchestrates load, classification,
 * recovery matching, metrics and reporting
 */
import { join } from 'path';
import { logger, FileManager } from '../utils/index.js';
import {
  FieldNormalizer,
  AbandonDetector,
  RecoveryMatcher,
  MetricsAggregator,
  ConsistencyValidator,
  CallLogLoader,
  ReportWriter,
} from '../services/index.js';
import type {
  AnalysisOptions,
  AnalysisResult,
  AnalysisStats,
  DataQualityIssue,
  InboundCallRecord,
  IssueKind,
  OutboundCallRecord,
} from '../types/index.js';

export interface ProcessorOptions {
  httpTimeoutMs?: number;
  /** Centre of the accepted timestamp window; defaults to the time of each analysis */
  referenceTime?: Date;
}

export class AbandonAnalysisProcessor {
  private loader: CallLogLoader;
  private reportWriter: ReportWriter;
  private detector: AbandonDetector;
  private aggregator: MetricsAggregator;
  private validator: ConsistencyValidator;
  private referenceTime?: Date;

  constructor(options: ProcessorOptions = {}) {
    this.loader = new CallLogLoader(options.httpTimeoutMs);
    this.reportWriter = new ReportWriter();
    this.detector = new AbandonDetector();
    this.aggregator = new MetricsAggregator();
    this.validator = new ConsistencyValidator();
    this.referenceTime = options.referenceTime;
  }

  /**
   * Run the core over in-memory logs. Pass `outbound` as undefined when there
   * is no dialer log at all; an empty array is reported as an empty dataset.
   */
  analyze(inbound: InboundCallRecord[], outbound?: OutboundCallRecord[]): AnalysisResult {
    const issues: DataQualityIssue[] = [];

    if (inbound.length === 0) {
      logger.warn('ACD log is empty - results will be empty');
      issues.push({ kind: 'EmptyDataset', source: 'INBOUND_QUEUE', details: 'No data to process' });
    }
    if (outbound && outbound.length === 0) {
      logger.warn('CALL log is empty - only inbound recovery will be found');
      issues.push({ kind: 'EmptyDataset', source: 'OUTBOUND_DIALER', details: 'No data to process' });
    }

    const normalizer = new FieldNormalizer(this.referenceTime);
    const inboundLog = normalizer.normalizeInboundLog(inbound);
    const outboundLog = normalizer.normalizeOutboundLog(outbound ?? []);
    issues.push(...inboundLog.issues, ...outboundLog.issues);

    logger.info(`Processing ${inbound.length} ACD records (${inboundLog.calls.length} valid)...`);
    const aggregates = this.detector.detect(inboundLog.calls);

    const matcher = new RecoveryMatcher(normalizer);
    const recovery = matcher.match(aggregates, inboundLog.calls, outboundLog.calls);
    issues.push(...recovery.issues);

    const summary = this.aggregator.summarize(inboundLog.calls, aggregates);
    const daily = this.aggregator.daily(inboundLog.calls, aggregates);
    const checks = this.validator.validate(summary);

    for (const issue of issues) {
      logger.debug(`[${issue.kind}] ${issue.source ?? ''} row ${issue.rowNumber ?? '-'}: ${issue.details}`);
    }

    return { summary, aggregates, daily, checks, issues };
  }

  /**
   * Load both logs, analyze them and write the reports
   */
  async run(options: AnalysisOptions): Promise<AnalysisStats> {
    const stats: AnalysisStats = {
      inboundRecords: 0,
      outboundRecords: 0,
      validInboundCalls: 0,
      uniqueAbandonPhones: 0,
      recoveredPhones: 0,
      failedChecks: 0,
      issueCount: 0,
      startTime: new Date(),
    };

    try {
      logger.info('Starting abandon call analysis...');

      const inbound = await this.loader.loadInboundLog(options.acdSource);
      const outbound = await this.loadOptionalOutbound(options.callSource);
      stats.inboundRecords = inbound.records.length;
      stats.outboundRecords = outbound?.records.length ?? 0;

      const result = this.analyze(inbound.records, outbound?.records);
      result.issues.unshift(...inbound.issues, ...(outbound?.issues ?? []));

      stats.validInboundCalls = result.summary.validCalls;
      stats.uniqueAbandonPhones = result.summary.uniqueAbandonPhones;
      stats.recoveredPhones = result.summary.recoveredPhones;
      stats.failedChecks = result.checks.filter((c) => !c.passed).length;
      stats.issueCount = result.issues.length;

      await FileManager.ensureDir(options.outputDir);
      stats.reportPath = join(options.outputDir, options.reportFilename);
      await this.reportWriter.writeWorkbook(result, stats.reportPath);

      if (options.writeJson) {
        stats.jsonPath = join(options.outputDir, FileManager.generateJsonFilename(options.reportFilename));
        await this.reportWriter.writeJson(result, stats.jsonPath);
      }

      stats.endTime = new Date();
      this.logResult(result, stats);

      return stats;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Abandon analysis failed:', message);
      throw error;
    }
  }

  private async loadOptionalOutbound(source: string | undefined) {
    if (!source) {
      logger.warn('No CALL log configured - proceeding with ACD data only');
      return undefined;
    }
    const isUrl = /^https?:\/\//i.test(source);
    if (!isUrl && !(await FileManager.fileExists(source))) {
      logger.warn(`CALL log not found at ${source} - proceeding with ACD data only`);
      return undefined;
    }
    return this.loader.loadOutboundLog(source);
  }

  /**
   * Log validation results, the business summary and data quality counts
   */
  private logResult(result: AnalysisResult, stats: AnalysisStats): void {
    const { summary } = result;
    const duration = stats.endTime
      ? (stats.endTime.getTime() - stats.startTime.getTime()) / 1000
      : 0;

    const separator = '='.repeat(60);
    logger.info(`\n${separator}`);
    logger.info('METRIC VALIDATION RESULTS');
    logger.info(separator);
    for (const check of result.checks) {
      if (check.passed) {
        logger.info(check.message);
      } else {
        logger.error(check.message);
      }
    }

    logger.info(`\n${separator}`);
    logger.info('BUSINESS SUMMARY');
    logger.info(separator);
    logger.info(`Total abandon calls: ${summary.abandonCalls}`);
    logger.info(`Unique phone numbers with abandons: ${summary.uniqueAbandonPhones}`);
    logger.info(`Unique phone numbers recovered: ${summary.recoveredPhones}`);
    logger.info(`Unique phone numbers needing outbound calls: ${summary.needingOutboundPhones}`);
    logger.info(`Abandonment rate: ${summary.abandonmentRate}%`);
    logger.info(`Duration: ${duration.toFixed(1)}s`);

    if (result.issues.length > 0) {
      logger.warn(`\nDATA QUALITY ISSUES: ${result.issues.length}`);
      const byKind = new Map<IssueKind, number>();
      for (const issue of result.issues) {
        byKind.set(issue.kind, (byKind.get(issue.kind) ?? 0) + 1);
      }
      for (const [kind, count] of byKind) {
        logger.warn(`  ${kind}: ${count} instances`);
      }
    }

    logger.info(separator);
  }
}
