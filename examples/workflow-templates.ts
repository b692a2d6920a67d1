import {
  ClientSDKError,
  WorkflowTemplateServiceClient,
  regionPath,
  workflowTemplatePath,
} from "../src/index.js"

/**
 * Example: Manage workflow templates
 *
 * Creates a template, runs it, lists the templates of the region and deletes
 * the template again.
 *
 * Usage:
 *   PROJECT_ID=my-project REGION=europe-west1 npx tsx examples/workflow-templates.ts
 */

async function main() {
  const projectId = process.env["PROJECT_ID"] ?? "my-project"
  const region = process.env["REGION"] ?? "europe-west1"
  const parent = regionPath(projectId, region)

  const client = WorkflowTemplateServiceClient.fromCredentialsFile(
    process.env["DATAPROC_CREDENTIALS"] ?? "credentials.json",
  )

  try {
    const template = await client.createWorkflowTemplate({
      parent,
      template: {
        id: "nightly-etl",
        placement: { managed_cluster: { cluster_name: "etl" } },
        jobs: [
          { step_id: "ingest", job_type: "spark", main_file_uri: "gs://bucket/ingest.jar" },
          {
            step_id: "report",
            job_type: "pyspark",
            main_file_uri: "gs://bucket/report.py",
            prerequisite_step_ids: ["ingest"],
          },
        ],
      },
    })
    console.log(`Created ${template.name} (version ${template.version})`)

    const operation = await client.instantiateWorkflowTemplate({
      name: workflowTemplatePath(projectId, region, "nightly-etl"),
    })
    console.log(`Started ${operation.name}`)

    const pager = await client.listWorkflowTemplates({ parent })
    for await (const t of pager) {
      console.log(`- ${t.id} v${t.version}`)
    }

    await client.deleteWorkflowTemplate({
      name: workflowTemplatePath(projectId, region, "nightly-etl"),
    })
  } finally {
    client.close()
  }
}

main().catch((error: unknown) => {
  if (error instanceof ClientSDKError) {
    console.error(`${error.name} (${error.code}): ${error.message}`)
  } else {
    console.error(error)
  }
  process.exitCode = 1
})
