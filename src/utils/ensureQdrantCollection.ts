import { QdrantClient } from "@qdrant/js-client-rest";

import { errorMessage } from "../helper/appError";

/**
 * Creates the collection if it is missing and makes sure the payload fields
 * used in filters are indexed. Safe to call repeatedly.
 */
async function ensureQdrantCollection(
  client: QdrantClient,
  collectionName: string,
  vectorSize = 1536, // adjust to your embedding dim
  indexFields: string[] = ["userId", "fileId"]
): Promise<void> {
  const { collections } = await client.getCollections();
  const exists = collections.some((c) => c.name === collectionName);

  if (!exists) {
    try {
      await client.createCollection(collectionName, {
        vectors: { size: vectorSize, distance: "Cosine" },
      });
      console.log(`Qdrant collection '${collectionName}' created.`);
    } catch (err) {
      // another process may have won the race
      const again = await client.getCollections();
      if (!again.collections.some((c) => c.name === collectionName)) throw err;
    }
  }

  for (const field of indexFields) {
    try {
      await client.createPayloadIndex(collectionName, {
        field_name: field,
        field_schema: "keyword",
        wait: true,
      });
    } catch (err) {
      const message = errorMessage(err).toLowerCase();
      if (!message.includes("already exists")) {
        console.warn(`Failed to create index for '${field}':`, errorMessage(err));
      }
    }
  }
}

export default ensureQdrantCollection;
