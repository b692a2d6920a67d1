import { ClusterControllerClient, createLogger } from "../src/index.js"

/**
 * Example: List the clusters of a region
 *
 * This example demonstrates both ways to consume a list call:
 * - iterating clusters directly, pages are fetched as needed
 * - iterating raw pages, e.g. to report progress per page
 *
 * Credentials come from DATAPROC_ACCESS_TOKEN or the file named by
 * DATAPROC_CREDENTIALS.
 *
 * Usage:
 *   PROJECT_ID=my-project REGION=europe-west1 npx tsx examples/list-clusters.ts
 */

async function main() {
  const projectId = process.env["PROJECT_ID"] ?? "my-project"
  const region = process.env["REGION"] ?? "europe-west1"

  const client = new ClusterControllerClient({
    logger: createLogger({ level: "debug" }),
  })
  const controller = new AbortController()
  process.once("SIGINT", () => controller.abort())

  try {
    const pager = await client.listClusters(
      { project_id: projectId, region, page_size: 10 },
      {},
      { timeout: 30_000, signal: controller.signal },
    )

    for await (const cluster of pager) {
      console.log(`${cluster.cluster_name}: ${cluster.status?.state ?? "UNKNOWN"}`)
    }

    // Page by page, with a fresh listing
    const paged = await client.listClusters(null, { project_id: projectId, region })
    let pageNumber = 0
    for await (const page of paged.pages) {
      pageNumber++
      console.log(`page ${pageNumber}: ${page.clusters.length} clusters`)
    }
  } finally {
    client.close()
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
