import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { QuestionAnswerService } from "../services/questionAnswerService.js";

export function registerAskQuestionTool(server: McpServer, service: QuestionAnswerService) {
  server.registerTool(
    "ask_question",
    {
      title: "Ask Question",
      description:
        "Answers a question from the corpus and returns shaped bullets, references and the supporting context.",
      inputSchema: {
        question: z.string().describe("Question about the indexed corpus"),
        include_images: z
          .boolean()
          .optional()
          .describe("Return base64 image payloads with the context (default false)"),
      },
    },
    async ({ question, include_images }) => {
      const result = await service.handleQuery(question);
      const payload = include_images
        ? result
        : {
            ...result,
            context_images: result.context_images.map((image) => ({ summary: image.summary })),
          };

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(payload, null, 2),
          },
        ],
      };
    },
  );
}
