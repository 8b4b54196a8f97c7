#!/usr/bin/env node
/**
 * Main module for the developer knowledge base CLI
 */

import "dotenv/config";
import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { runCommand } from "./commands.js";
import {
  KnowledgeBaseError,
  KnowledgeBaseErrorSubType,
  createDefaultErrorHandler,
} from "./errors/index.js";
import { createKnowledgeBase } from "./rag/pipeline.js";
import { getConfigValue, logger } from "./utils.js";

/** Commands that need an existing index; search on an empty corpus finds nothing */
const READ_COMMANDS: ReadonlySet<string> = new Set(["show", "list", "ask"]);

async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  const errorHandler = createDefaultErrorHandler();

  try {
    const dataDir = getConfigValue("DATA_DIR");
    const kb = createKnowledgeBase();
    const loaded = await kb.load(dataDir);
    const command = argv[0];
    if (!loaded && command !== undefined && READ_COMMANDS.has(command)) {
      throw new KnowledgeBaseError(
        `No index in ${dataDir}`,
        KnowledgeBaseErrorSubType.INDEX_NOT_FOUND,
        { dataDir }
      );
    }

    const result = await runCommand(kb, argv);
    if (result.mutated) {
      await kb.save(dataDir);
    }

    console.log(result.output);
    return 0;
  } catch (error) {
    logger.debug("Command failed:", error);
    console.error(errorHandler.handle(error).userMessage);
    return 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  // bin links point at this file through a symlink
  return script !== undefined && import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      logger.error("Fatal error:", error);
      process.exit(1);
    });
}

export { main };
