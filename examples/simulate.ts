import {
  TrialQuery,
  costStats,
  parseSimulationRequest,
  runMonteCarlo,
} from "../src/index";
import type { Stats, TokenSpec } from "../src/index";

const FULL = "█";
const termWidth = () => process.stdout.columns ?? 80;

const fmt = (n: number) => n.toFixed(2).padStart(9);

function printSummary(title: string, stats: Stats) {
  console.log(`\n${title}`);
  console.log(`  trials ${stats.count}`);
  console.log(`  mean  ${fmt(stats.mean)}   stddev ${fmt(stats.stddev)}`);
  console.log(`  p50   ${fmt(stats.p50)}   p90    ${fmt(stats.p90)}   p99 ${fmt(stats.p99)}`);
  console.log(`  min   ${fmt(stats.min)}   max    ${fmt(stats.max)}`);
}

/** Histogram of pulls-to-goal in buckets of `width` draws. */
function printHistogram(query: TrialQuery, width = 10) {
  const buckets = new Map<number, number>();
  for (const [value, share] of Object.entries(query.distribution())) {
    const bucket = Math.floor(Number(value) / width) * width;
    buckets.set(bucket, (buckets.get(bucket) ?? 0) + share);
  }
  const peak = Math.max(...buckets.values());
  const barWidth = Math.max(10, termWidth() - 24);

  for (const [bucket, share] of [...buckets].sort(([a], [b]) => a - b)) {
    const bar = FULL.repeat(Math.round((share / peak) * barWidth));
    const label = `${bucket}-${bucket + width - 1}`.padStart(8);
    console.log(`${label} ${(share * 100).toFixed(1).padStart(5)}% ${bar}`);
  }
}

const primogem: TokenSpec = { name: "Primogem", perDraw: 160 };

function characterBannerExample() {
  const request = parseSimulationRequest({
    pBase: "0.006",
    pity: "90",
    rampStart: "73",
    softMode: "per_draw_increment",
    increment: "0.06",
    offProbs: "0.5",
    maxOff: "1",
    goal: "first_up",
    trials: "20000",
    seed: "example",
  });

  const stats = runMonteCarlo(request.params, request.goal, request.trials, request.budget, {
    seed: request.seed,
  });

  printSummary("Draws to the featured character", stats);
  printHistogram(new TrialQuery(stats.samples));
  printSummary(`Cost in ${primogem.name}s`, costStats(stats, primogem));
}

characterBannerExample();
