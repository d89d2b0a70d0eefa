import "dotenv/config";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { loadConfig } from "../src/config/env.js";
import { createRuntime } from "../src/services/createRuntime.js";
import { setLogLevel } from "../src/utils/logger.js";

const evalQuestionsSchema = z.array(
  z.object({
    question: z.string(),
    expected_keywords: z.array(z.string()),
  }),
);

type EvalQuestion = z.infer<typeof evalQuestionsSchema>[number];

async function main() {
  const config = loadConfig();
  setLogLevel("warn");

  const { service } = await createRuntime(config);
  const questions = await loadQuestions(process.argv[2] ?? "eval/questions.json");

  const rows: Array<{
    question: string;
    text_origin: string;
    image_origin: string;
    keyword_hit: boolean;
    reference_count: number;
    latency_ms: number;
  }> = [];

  for (const item of questions) {
    const result = await service.handleQuery(item.question);
    const haystack = [result.answer_text, ...result.references].join("\n").toLowerCase();

    rows.push({
      question: item.question,
      text_origin: result.retrieval_origin?.texts ?? "rejected",
      image_origin: result.retrieval_origin?.images ?? "rejected",
      keyword_hit: item.expected_keywords.some((keyword) =>
        haystack.includes(keyword.toLowerCase()),
      ),
      reference_count: result.references.length,
      latency_ms: result.latency_ms,
    });
  }

  const textFallbackRate = ratio(
    rows.filter((row) => row.text_origin === "keyword").length,
    rows.length,
  );
  const imageFallbackRate = ratio(
    rows.filter((row) => row.image_origin === "keyword").length,
    rows.length,
  );
  const keywordHitRate = ratio(
    rows.filter((row) => row.keyword_hit).length,
    rows.length,
  );
  const avgLatencyMs =
    rows.length === 0
      ? 0
      : Math.round(rows.reduce((sum, row) => sum + row.latency_ms, 0) / rows.length);

  console.log("Evaluation Summary");
  console.log("==================");
  console.log(`questions: ${rows.length}`);
  console.log(`text_fallback_rate: ${textFallbackRate}`);
  console.log(`image_fallback_rate: ${imageFallbackRate}`);
  console.log(`keyword_hit_rate: ${keywordHitRate}`);
  console.log(`avg_latency_ms: ${avgLatencyMs}`);
  console.log("");
  console.log("Per Question");
  console.log("------------");
  for (const row of rows) {
    console.log(
      `- ${row.question} | texts=${row.text_origin} | images=${row.image_origin} | keyword=${row.keyword_hit} | refs=${row.reference_count} | latency=${row.latency_ms}ms`,
    );
  }
}

async function loadQuestions(filePath: string): Promise<EvalQuestion[]> {
  const raw = await readFile(path.resolve(filePath), "utf-8");
  return evalQuestionsSchema.parse(JSON.parse(raw));
}

function ratio(hit: number, total: number): string {
  if (total === 0) {
    return "0.00";
  }
  return (hit / total).toFixed(2);
}

main().catch((error) => {
  console.error("Evaluation failed:", error);
  process.exit(1);
});
