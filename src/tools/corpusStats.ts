import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { Runtime } from "../services/createRuntime.js";

export async function describeCorpus(runtime: Runtime) {
  return {
    documents: runtime.report.documents,
    malformed_items: runtime.report.malformed,
    stored_items: await runtime.documentStore.size(),
    summary_index: await runtime.summaryIndex.stats(),
    fallback_pools: {
      text_summaries: runtime.corpus.pools.textSummaries.length,
      texts: runtime.corpus.pools.texts.length,
      images: runtime.corpus.pools.images.length,
    },
    load_errors: runtime.loadErrors,
  };
}

export function registerCorpusStatsTool(server: McpServer, runtime: Runtime) {
  server.registerTool(
    "corpus_stats",
    {
      title: "Corpus Stats",
      description: "Lists loaded content counts, index coverage and artifact load errors.",
      inputSchema: {},
    },
    async () => {
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(await describeCorpus(runtime), null, 2),
          },
        ],
      };
    },
  );
}
