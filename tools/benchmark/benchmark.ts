/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

import { writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import pc from 'picocolors';
import { createInflector } from '../../packages/pluralizer/src/index';

interface BenchmarkConfig {
  warmupRuns: number;
  iterations: number;
  outputPath?: string;
}

interface Scenario {
  name: string;
  description: string;
  calls: number; // inflections per iteration
  run: () => void;
}

interface ScenarioResult {
  name: string;
  description: string;
  iterations: number;
  calls: number;
  totalMs: number;
  avgIterationMs: number;
  minIterationMs: number;
  maxIterationMs: number;
  callsPerSecond: number;
}

interface BenchmarkReport {
  metadata: {
    timestamp: string;
    warmupRuns: number;
    iterations: number;
    duration: number;
  };
  results: ScenarioResult[];
}

const SAMPLE_WORDS = ['house', 'Child', 'analysis', 'tooth', 'CITY', 'sheep', 'knife', 'person', 'box', 'news'];

function buildScenarios(): Scenario[] {
  const shared = createInflector();

  return [
    {
      name: 'pluralize-10k',
      description: 'pluralize("house", 2) 10,000 times',
      calls: 10_000,
      run: () => {
        for (let i = 0; i < 10_000; i++) {
          shared.pluralize('house', 2);
        }
      }
    },
    {
      name: 'mixed-words',
      description: 'both directions over a mix of regular, irregular and uncountable words',
      calls: SAMPLE_WORDS.length * 2 * 500,
      run: () => {
        for (let i = 0; i < 500; i++) {
          for (const word of SAMPLE_WORDS) {
            shared.toSingular(shared.toPlural(word));
          }
        }
      }
    },
    {
      name: 'add-rules-then-pluralize',
      description: 'register an irregular and an uncountable, then pluralize',
      calls: 1,
      run: () => {
        shared.addIrregularRule('child', 'children');
        shared.addUncountableRule('money');
        shared.pluralize('child', 2);
      }
    },
    {
      name: 'cold-start',
      description: 'new inflector, load defaults, first pluralize',
      calls: 1,
      run: () => {
        createInflector().pluralize('house', 2);
      }
    }
  ];
}

function measure(scenario: Scenario, config: BenchmarkConfig): ScenarioResult {
  for (let i = 0; i < config.warmupRuns; i++) {
    scenario.run();
  }

  const timings: number[] = [];
  for (let i = 0; i < config.iterations; i++) {
    const t = performance.now();
    scenario.run();
    timings.push(performance.now() - t);
  }

  const totalMs = timings.reduce((sum, ms) => sum + ms, 0);
  const avgIterationMs = totalMs / timings.length;

  return {
    name: scenario.name,
    description: scenario.description,
    iterations: config.iterations,
    calls: scenario.calls,
    totalMs,
    avgIterationMs,
    minIterationMs: Math.min(...timings),
    maxIterationMs: Math.max(...timings),
    callsPerSecond: avgIterationMs > 0 ? (scenario.calls / avgIterationMs) * 1000 : Infinity
  };
}

function printResults(results: ScenarioResult[]): void {
  console.log(pc.bold('\nResults:'));
  for (const result of results) {
    console.log(`  ${pc.cyan(result.name.padEnd(26))} ${result.avgIterationMs.toFixed(3).padStart(10)} ms/iter  ${Math.round(result.callsPerSecond).toLocaleString('en-US').padStart(14)} calls/s`);
    console.log(`  ${pc.dim(result.description)}`);
  }
}

function runBenchmarkSuite(config: BenchmarkConfig): BenchmarkReport {
  const t0 = performance.now();
  const results = buildScenarios().map((scenario) => {
    console.log(pc.dim(`Running ${scenario.name}...`));
    return measure(scenario, config);
  });

  return {
    metadata: {
      timestamp: new Date().toISOString(),
      warmupRuns: config.warmupRuns,
      iterations: config.iterations,
      duration: performance.now() - t0
    },
    results
  };
}

function main(): void {
  const args = process.argv.slice(2);
  const config: BenchmarkConfig = { warmupRuns: 3, iterations: 20 };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--warmup':
        config.warmupRuns = parseInt(args[++i], 10);
        break;
      case '--iterations':
        config.iterations = parseInt(args[++i], 10);
        if (!(config.iterations >= 1)) {
          console.error(pc.red('Iterations must be at least 1'));
          process.exit(1);
        }
        break;
      case '--output':
        config.outputPath = args[++i];
        break;
      case '--help':
        console.log(`
Benchmark Tool for pluralizer

Usage:
  tsx tools/benchmark/benchmark.ts [options]

Options:
  --warmup <number>     Number of warmup runs per scenario (default: 3)
  --iterations <number> Number of measured runs per scenario (default: 20)
  --output <path>       Save the report as JSON
  --help                Show this help message
        `);
        process.exit(0);
    }
  }

  const report = runBenchmarkSuite(config);
  printResults(report.results);

  if (config.outputPath) {
    const resolvedOutputPath = resolve(config.outputPath);
    const outputDir = dirname(resolvedOutputPath);
    if (!existsSync(outputDir)) {
      mkdirSync(outputDir, { recursive: true });
    }
    writeFileSync(resolvedOutputPath, JSON.stringify(report, null, 2), 'utf-8');
    console.log(pc.green(`\nResults saved to: ${resolvedOutputPath}`));
  }
}

main();

export { runBenchmarkSuite, type BenchmarkConfig, type BenchmarkReport, type ScenarioResult };
