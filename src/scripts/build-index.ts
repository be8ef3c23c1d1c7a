import { fileURLToPath } from "node:url";
import { config } from "../config/index.js";
import { buildIndex } from "../modules/dataset/index-builder.js";

const usage = `Usage:
  npm run build-index -- [--dataset <file>] [--collection <name>]

Options:
  --dataset <file>        Dataset JSON export. Default: DATASET_FILE
  --collection <name>     Target collection. Default: QDRANT_COLLECTION

Environment:
  OPENAI_API_KEY          Required for embeddings
  QDRANT_URL              Qdrant endpoint (APP_MODE=prod)
  LOCAL_VECTOR_STORE_FILE File-backed store used when QDRANT_URL is unset
`;

const readArg = (argv: readonly string[], name: string): string | undefined => {
  const index = argv.indexOf(name);
  if (index === -1) {
    return undefined;
  }
  return argv[index + 1];
};

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  if (argv.includes("--help")) {
    console.info(usage);
    return;
  }

  const result = await buildIndex({
    datasetFile: readArg(argv, "--dataset") ?? config.DATASET_FILE,
    collection: readArg(argv, "--collection") ?? config.QDRANT_COLLECTION,
    distance: config.VECTOR_DISTANCE
  });
  console.info(`Indexed ${result.indexedCount} entries into ${result.collection} (${result.dimensions} dimensions).`);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    console.error("Index build failed", error);
    process.exitCode = 1;
  });
}
