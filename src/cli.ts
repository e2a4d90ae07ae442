#!/usr/bin/env node
/**
 * Code Knowledge Graph - CLI
 *
 * Scans a project into the graph store and prints analyses as text or JSON.
 *
 * @module cli
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { countBySeverity, SEVERITY_ORDER, type AnalysisFinding, type AnalysisResult } from './analytics/types.js';
import { generateDefaultConfig } from './config.js';
import { CodeGraphEngine, type ScanResult } from './engine.js';
import type { TraversalHit } from './graph/query.js';
import { isCodeGraphError, errorMessage } from './utils/errors.js';
import { isLogLevel, logger } from './utils/logger.js';

const VERSION = '0.1.0';

interface CommonOptions {
  path: string;
  project?: string;
  json?: boolean;
  /** False with --no-scan */
  scan: boolean;
}

const program: Command = new Command();

program
  .name('ckg')
  .description('Code knowledge graph: scan a project and analyse its structure')
  .version(VERSION)
  .option('--log-level <level>', 'debug, info, warn or error (overrides LOG_LEVEL)')
  .hook('preAction', () => {
    const { logLevel } = program.opts<{ logLevel?: string }>();
    if (logLevel === undefined) return;
    if (!isLogLevel(logLevel)) {
      program.error(`Unknown log level "${logLevel}"`);
    }
    logger.configure({ level: logLevel });
  });

// ============================================================================
// HELPERS
// ============================================================================

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function printScan(scan: ScanResult): void {
  const { parse, build } = scan;
  console.log(`📇 ${parse.summary}`);
  for (const [language, stats] of Object.entries(parse.perLanguageStats)) {
    const fallback = stats.usedFallback ? ' (pattern extraction)' : '';
    console.log(`   ${language}: ${stats.files} files, ${stats.entities} entities${fallback}`);
  }
  for (const error of parse.errors) {
    console.log(`   ⚠️  ${error.filePath}: ${error.message}`);
  }

  const icon = build.success ? '✅' : '❌';
  console.log(
    `${icon} Graph ${scan.projectId}: ${build.nodesCreated} nodes, ` +
      `${build.relationshipsCreated} relationships in ${(build.durationMs / 1000).toFixed(2)}s`
  );
  for (const warning of build.warnings) console.log(`   ⚠️  ${warning}`);
  for (const error of build.errors) console.log(`   ❌ ${error}`);
}

function printFinding(finding: AnalysisFinding): void {
  console.log(`[${finding.severity.toUpperCase()}] ${finding.title}`);
  console.log(`   ${finding.description}`);
  if (finding.filePath) {
    console.log(`   at ${finding.filePath}${finding.startLine ? `:${finding.startLine}` : ''}`);
  }
  for (const entity of finding.affectedEntities.slice(0, 10)) {
    const impact = entity.impact ? ` (${entity.impact})` : '';
    console.log(`   - ${entity.kind} ${entity.qualifiedName}${impact}`);
  }
  if (finding.affectedEntities.length > 10) {
    console.log(`   ... and ${finding.affectedEntities.length - 10} more`);
  }
}

function printAnalysis(result: AnalysisResult): void {
  if (!result.success) {
    for (const error of result.errors) console.log(`❌ ${error}`);
    return;
  }

  const counts = countBySeverity(result.findings);
  const summary = SEVERITY_ORDER.filter((severity) => counts[severity] > 0)
    .map((severity) => `${counts[severity]} ${severity}`)
    .join(', ');
  console.log(`\n🔎 ${result.findings.length} finding(s)${summary ? `: ${summary}` : ''}\n`);

  const ordered = [...result.findings].sort(
    (a, b) => SEVERITY_ORDER.indexOf(a.severity) - SEVERITY_ORDER.indexOf(b.severity)
  );
  for (const finding of ordered) {
    printFinding(finding);
    console.log('');
  }
  for (const warning of result.warnings) console.log(`💡 ${warning}`);
}

/**
 * Open the engine for a command, scanning first unless --no-scan was given
 */
async function withEngine(
  options: CommonOptions,
  run: (engine: CodeGraphEngine, projectId: string) => Promise<void>
): Promise<void> {
  const engine = await CodeGraphEngine.open(path.resolve(options.path));
  try {
    const projectId = options.project ?? engine.defaultProjectId;
    if (options.scan) {
      const scan = await engine.scan({ projectId });
      if (!options.json) printScan(scan);
    }
    await run(engine, projectId);
  } finally {
    await engine.close();
  }
}

function addCommonOptions(command: Command): Command {
  return command
    .option('-p, --path <path>', 'Project path', process.cwd())
    .option('--project <id>', 'Project id (defaults to the directory name)')
    .option('--json', 'Print JSON')
    .option('--no-scan', 'Use the graph already in the store');
}

function fail(error: unknown): void {
  if (isCodeGraphError(error)) {
    console.error(error.toCliOutput());
  } else {
    console.error(`✗ ${errorMessage(error)}`);
  }
  process.exitCode = 1;
}

// ============================================================================
// INIT COMMAND
// ============================================================================

program
  .command('init')
  .description('Write a starter .codegraphrc.json')
  .option('-p, --path <path>', 'Project path', process.cwd())
  .option('-f, --force', 'Overwrite an existing file')
  .action((options: { path: string; force?: boolean }) => {
    const configPath = path.join(path.resolve(options.path), '.codegraphrc.json');
    if (fs.existsSync(configPath) && !options.force) {
      console.log(`⚠️  ${configPath} already exists (use --force to overwrite)`);
      return;
    }
    fs.writeFileSync(configPath, generateDefaultConfig() + '\n');
    console.log(`✅ Created ${configPath}`);
  });

// ============================================================================
// SCAN COMMAND
// ============================================================================

program
  .command('scan')
  .description('Parse the project and replace its graph')
  .option('-p, --path <path>', 'Project path', process.cwd())
  .option('--project <id>', 'Project id (defaults to the directory name)')
  .option('-l, --languages <languages...>', 'Only parse these languages')
  .option('--json', 'Print JSON')
  .action(async (options: { path: string; project?: string; languages?: string[]; json?: boolean }) => {
    try {
      const engine = await CodeGraphEngine.open(path.resolve(options.path));
      try {
        const scan = await engine.scan({ projectId: options.project, languages: options.languages });
        if (options.json) printJson(scan);
        else printScan(scan);
        if (!scan.build.success) process.exitCode = 1;
      } finally {
        await engine.close();
      }
    } catch (error) {
      fail(error);
    }
  });

// ============================================================================
// OVERVIEW COMMAND
// ============================================================================

addCommonOptions(program.command('overview').description('Show entity and relationship counts')).action(
  async (options: CommonOptions) => {
    try {
      await withEngine(options, async (engine, projectId) => {
        const overview = await engine.query.getProjectOverview(projectId);
        if (options.json) {
          printJson(overview);
          return;
        }
        console.log(`\n📊 ${projectId}: ${overview.totalEntities} entities, ${overview.totalRelationships} relationships`);
        for (const [kind, count] of Object.entries(overview.entityCounts)) {
          if (count > 0) console.log(`   ${kind}: ${count}`);
        }
        for (const [type, count] of Object.entries(overview.relationshipCounts)) {
          if (count > 0) console.log(`   ${type}: ${count}`);
        }
      });
    } catch (error) {
      fail(error);
    }
  }
);

// ============================================================================
// ANALYZE COMMAND
// ============================================================================

addCommonOptions(
  program.command('analyze').description('Find circular dependencies and potentially unused entities')
).action(async (options: CommonOptions) => {
  try {
    await withEngine(options, async (engine, projectId) => {
      const result = await engine.analyzeArchitecture(projectId);
      if (options.json) printJson(result);
      else printAnalysis(result);
      if (!result.success) process.exitCode = 1;
    });
  } catch (error) {
    fail(error);
  }
});

// ============================================================================
// IMPACT COMMAND
// ============================================================================

addCommonOptions(
  program
    .command('impact')
    .description('Estimate what a change can affect')
    .option('-e, --entities <names...>', 'Changed qualified names', [])
    .option('-f, --files <files...>', 'Changed files, relative to the project root', [])
).action(async (options: CommonOptions & { entities: string[]; files: string[] }) => {
  try {
    await withEngine(options, async (engine, projectId) => {
      const result = await engine.analyzeChangeSet(
        { changedEntityNames: options.entities, changedFiles: options.files },
        projectId
      );
      if (options.json) printJson(result);
      else printAnalysis(result);
      if (!result.success) process.exitCode = 1;
    });
  } catch (error) {
    fail(error);
  }
});

// ============================================================================
// CALLERS COMMAND
// ============================================================================

addCommonOptions(
  program
    .command('callers <qualifiedName>')
    .description('List the callers of an entity')
    .option('-d, --depth <n>', 'Traversal depth', '1')
).action(async (qualifiedName: string, options: CommonOptions & { depth: string }) => {
  try {
    await withEngine(options, async (engine, projectId) => {
      const matches = await engine.query.findEntitiesByQualifiedName(projectId, qualifiedName);
      const depth = Number(options.depth);
      const hits: TraversalHit[] = [];
      for (const entity of matches) {
        hits.push(...(await engine.query.traverseCalls(entity.id, 'callers', depth)));
      }

      if (options.json) {
        printJson(hits);
        return;
      }
      if (matches.length === 0) {
        console.log(`No entity named ${qualifiedName}`);
        return;
      }
      console.log(`\n📞 ${hits.length} caller(s) of ${qualifiedName}:`);
      for (const hit of hits) {
        console.log(`   ${'  '.repeat(hit.depth - 1)}${hit.entity.qualifiedName} (${hit.entity.filePath}:${hit.entity.startLine})`);
      }
    });
  } catch (error) {
    fail(error);
  }
});

program.parse();
