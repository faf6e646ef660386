/**
 * Document Invocation Utility
 * Sends a prompt plus a local PDF or image files to the configured chat model
 * and prints the reply. Reads LLM_* settings from .env.local.
 */
import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import {
  MultiModalLLM,
  baseOutputSchema,
  createChatModel,
} from "../src/index.js";
import { isPdf, lookupMimeType } from "../src/utils/mime-types.js";

const scriptDir = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(scriptDir, "../.env.local") });

async function main() {
  const args = process.argv.slice(2);
  const structured = args[0] === "--structured";
  const [prompt, ...files] = structured ? args.slice(1) : args;

  if (!prompt || files.length === 0) {
    console.log(
      "Usage: npx tsx scripts/invoke-document.ts [--structured] <prompt> <file.pdf | image...>",
    );
    process.exit(1);
  }

  const isPdfInput = files.length === 1 && isPdf(lookupMimeType(files[0]) ?? "");
  const llm = new MultiModalLLM(createChatModel());
  const input = isPdfInput ? { pdf: files[0] } : { images: files };

  console.log(`Prompt: ${prompt}`);
  console.log(`Input: ${isPdfInput ? "pdf" : `${files.length} image(s)`}`);

  if (structured) {
    const result = await llm.ainvoke({
      prompt,
      ...input,
      outputSchema: baseOutputSchema,
    });
    console.log(JSON.stringify(result, null, 2));
  } else {
    const result = await llm.ainvoke({ prompt, ...input });
    console.log(result.content);
    if (result.usage) {
      console.log(`\n(${result.usage.totalTokens} tokens, ${result.model})`);
    }
  }
}

main().catch((err) => {
  console.error("Invocation failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
