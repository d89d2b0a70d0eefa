import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { QuestionAnswerService } from "../services/questionAnswerService.js";

export function registerSearchContextTool(server: McpServer, service: QuestionAnswerService) {
  server.registerTool(
    "search_context",
    {
      title: "Search Context",
      description: "Retrieves text and image context for a query without generating an answer.",
      inputSchema: {
        query: z.string().min(2).describe("Search query"),
        top_k: z.number().int().min(1).max(20).optional().describe("Vector retrieval depth"),
      },
    },
    async ({ query, top_k }) => {
      const result = await service.searchContext(query, top_k);

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                ...result,
                context_images: result.context_images.map((image) => ({
                  summary: image.summary,
                })),
              },
              null,
              2,
            ),
          },
        ],
      };
    },
  );
}
