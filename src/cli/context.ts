/**
 * Runtime wiring - builds every component a command needs from config
 */

import { resolve } from 'path';
import { BountyGateConfig } from '../types.js';
import { loadConfig } from '../core/config.js';
import { Logger, createCliLogger } from '../core/logger.js';
import { Orchestrator } from '../core/orchestrator.js';
import { RateLimiter } from '../core/rate-limiter.js';
import { JsonFileStorage, RunStorage } from '../core/storage.js';
import { AuditTrail } from '../policy/audit.js';
import { OverrideChannel, PolicyGate } from '../policy/gate.js';
import { loadManifest } from '../policy/manifest.js';
import { AdvisoryClient, AdvisoryService } from '../providers/advisory.js';
import { getExecutor } from '../providers/executors/index.js';
import { PassiveRecon } from '../recon/passive.js';
import { Crawler } from '../scanners/crawler.js';
import { NucleiScanner } from '../scanners/nuclei.js';
import { loadClassifier } from '../triage/classifier.js';
import { FusionTriageScorer } from '../triage/fusion-scorer.js';
import { MarkdownReporter } from '../output/markdown-report.js';

export interface RuntimeOptions {
  configPath?: string;
  /** CLI --allow-unblock; only takes effect when config allows it too */
  allowUnblock?: boolean;
  overrideChannel?: OverrideChannel;
}

export interface Runtime {
  config: BountyGateConfig;
  logger: Logger;
  storage: RunStorage;
  advisory?: AdvisoryService;
  gate: PolicyGate;
  orchestrator: Orchestrator;
}

export function loadRuntimeConfig(cwd: string, options: RuntimeOptions = {}): BountyGateConfig {
  return loadConfig(cwd, { configPath: options.configPath ? resolve(cwd, options.configPath) : undefined });
}

export function createLoggerFor(config: BountyGateConfig): Logger {
  return createCliLogger(config.logging);
}

export function createStorage(cwd: string, config: BountyGateConfig): RunStorage {
  return new JsonFileStorage(resolve(cwd, config.dataDir));
}

/**
 * Build the full runtime. Throws ConfigError before anything touches disk
 * or network when config, manifest or model files are invalid.
 */
export function createRuntime(cwd: string, config: BountyGateConfig, options: RuntimeOptions = {}): Runtime {
  const logger = createLoggerFor(config);
  const manifest = loadManifest(config.manifestPath ? resolve(cwd, config.manifestPath) : undefined);
  const classifier = loadClassifier(resolve(cwd, config.triage.modelPath));
  const storage = createStorage(cwd, config);

  const executor = getExecutor(config.advisory);
  const advisory = executor
    ? new AdvisoryClient({
        executor,
        logger,
        storage,
        storeResponses: config.advisory.storeResponses,
        timeoutMs: config.advisory.timeoutMs,
      })
    : undefined;
  if (!advisory) {
    logger.debug('Advisory service disabled');
  }
  if (!classifier) {
    logger.debug('No trained triage model, using neutral ML score');
  }

  const audit = new AuditTrail(storage, logger);
  const gate = new PolicyGate({
    manifest,
    audit,
    logger,
    advisory,
    allowManualOverride: options.allowUnblock === true && config.allowManualUnblock,
  });

  const orchestrator = new Orchestrator({
    gate,
    audit,
    limiter: new RateLimiter({ requestsPerMinute: config.scanRate, maxConcurrency: config.maxConcurrency }),
    storage,
    recon: new PassiveRecon({ logger, httpxThreads: config.httpxThreads, timeoutSeconds: config.timeoutSeconds }),
    crawler: new Crawler({
      logger,
      maxDepth: config.crawler.maxDepth,
      maxPages: config.crawler.maxPages,
      delaySeconds: config.crawler.delaySeconds,
      timeoutSeconds: config.timeoutSeconds,
    }),
    scanners: [
      new NucleiScanner({
        logger,
        rateLimit: config.nuclei.rateLimit,
        concurrency: config.nuclei.concurrency,
        templateTags: config.nuclei.templateTags,
        severity: config.nuclei.severity,
      }),
    ],
    scorer: new FusionTriageScorer({
      weights: { mlWeight: config.triage.mlWeight, llmWeight: config.triage.llmWeight },
      logger,
      classifier,
      advisory,
    }),
    reporter: new MarkdownReporter({
      logger,
      policy: {
        includeFalsePositives: config.report.includeFalsePositives,
        minScore: config.report.minScore,
        maxDetailed: config.report.maxDetailed,
      },
      advisory: config.report.polish ? advisory : undefined,
    }),
    logger,
    settings: {
      outputDir: resolve(cwd, config.outputDir),
      maxConcurrency: config.maxConcurrency,
      timeoutSeconds: config.timeoutSeconds,
      crawlSeedHosts: config.crawler.seedHosts,
    },
    overrideChannel: options.overrideChannel,
  });

  return { config, logger, storage, advisory, gate, orchestrator };
}
