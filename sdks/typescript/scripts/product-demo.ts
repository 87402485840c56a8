import "dotenv/config";
import { FugaClient, loadConfig, toClientOptions } from "../src";

// Walks one product through its lifecycle against the FUGA instance named in .env.
async function main(): Promise<void> {
  const config = loadConfig();
  const client = await FugaClient.connect(toClientOptions(config, { userAgentSuffix: "product-demo" }));
  const { logger } = client;

  const created = await client.products.create({ name: "New Album", release_date: "2024-12-31" });
  logger.info("Created product", created);

  if (typeof created.id !== "string" && typeof created.id !== "number") {
    throw new Error("FUGA did not return an id for the new product");
  }
  const productId = String(created.id);
  logger.info("Product details", await client.products.get(productId));
  logger.info("Updated product", await client.products.update(productId, { name: "Updated Album Name" }));
  logger.info("Updated territories", await client.products.updateTerritories(productId, ["US", "CA", "GB"]));
  logger.info("Barcode", await client.products.assignBarcode(productId));
  logger.info(`Delete response: ${await client.products.delete(productId)}`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
