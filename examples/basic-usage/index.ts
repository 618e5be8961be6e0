import dotenv from 'dotenv';
import { SearchClient } from '../../src';

// Load ALGOLIA_APPLICATION_ID / ALGOLIA_API_KEY from .env
dotenv.config();

const INDEX = process.env.EXAMPLE_INDEX || 'example_products';

async function main() {
  const client = SearchClient.create({
    logging: { level: 'info', format: 'pretty' },
  });

  try {
    const saved = await client.wait(
      await client.saveObjects(INDEX, [
        { objectID: 'sku-1', name: 'Trail running shoe', price: 120 },
        { objectID: 'sku-2', name: 'Road running shoe', price: 95 },
      ])
    );
    if (!saved.ok) {
      console.error('Indexing failed:', saved.error.code, saved.error.message);
      process.exitCode = 1;
      return;
    }

    const results = await client.search(INDEX, 'running', { hitsPerPage: 5 });
    if (results.ok) {
      console.log('Hits:', JSON.stringify(results.data.hits, null, 2));
    } else {
      console.error('Search failed:', results.error.code, results.error.message);
      process.exitCode = 1;
    }
  } finally {
    await client.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
