/**
 * A resource name pattern such as `projects/{project}/regions/{region}`.
 * Every segment variable matches one path segment.
 */
class PathTemplate<K extends string> {
  private readonly pattern: RegExp

  constructor(
    private readonly template: string,
    private readonly keys: readonly K[],
  ) {
    const source = template
      .split(/\{[A-Za-z]+\}/)
      .map((literal) => literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"))
      .join("([^/]+)")
    this.pattern = new RegExp(`^${source}$`)
  }

  /**
   * Fill every variable in one pass. Values are inserted as is, never
   * rescanned for variables or `$` patterns.
   */
  render(params: Record<K, string>): string {
    return this.template.replace(/\{([A-Za-z]+)\}/g, (variable, key: string) =>
      this.isKey(key) ? params[key] : variable,
    )
  }

  /**
   * Segment values of `path`, or an empty object when it does not match.
   */
  parse(path: string): Partial<Record<K, string>> {
    const match = this.pattern.exec(path)
    const result: Partial<Record<K, string>> = {}
    if (!match) {
      return result
    }

    this.keys.forEach((key, index) => {
      result[key] = match[index + 1]
    })
    return result
  }

  private isKey(key: string): key is K {
    return this.keys.some((known) => known === key)
  }
}

const CLUSTER = new PathTemplate(
  "projects/{project}/locations/{location}/clusters/{cluster}",
  ["project", "location", "cluster"],
)
const WORKFLOW_TEMPLATE = new PathTemplate(
  "projects/{project}/regions/{region}/workflowTemplates/{workflowTemplate}",
  ["project", "region", "workflowTemplate"],
)
const REGION = new PathTemplate("projects/{project}/regions/{region}", [
  "project",
  "region",
])
const BILLING_ACCOUNT = new PathTemplate("billingAccounts/{billingAccount}", [
  "billingAccount",
])
const FOLDER = new PathTemplate("folders/{folder}", ["folder"])
const ORGANIZATION = new PathTemplate("organizations/{organization}", [
  "organization",
])
const PROJECT = new PathTemplate("projects/{project}", ["project"])
const LOCATION = new PathTemplate("projects/{project}/locations/{location}", [
  "project",
  "location",
])

export function clusterPath(project: string, location: string, cluster: string): string {
  return CLUSTER.render({ project, location, cluster })
}

export function parseClusterPath(path: string) {
  return CLUSTER.parse(path)
}

/**
 * Resource name of a workflow template, as used in `name` fields and routing
 * headers
 */
export function workflowTemplatePath(
  project: string,
  region: string,
  workflowTemplate: string,
): string {
  return WORKFLOW_TEMPLATE.render({ project, region, workflowTemplate })
}

export function parseWorkflowTemplatePath(path: string) {
  return WORKFLOW_TEMPLATE.parse(path)
}

/**
 * Parent of workflow templates
 */
export function regionPath(project: string, region: string): string {
  return REGION.render({ project, region })
}

export function parseRegionPath(path: string) {
  return REGION.parse(path)
}

export function commonBillingAccountPath(billingAccount: string): string {
  return BILLING_ACCOUNT.render({ billingAccount })
}

export function parseCommonBillingAccountPath(path: string) {
  return BILLING_ACCOUNT.parse(path)
}

export function commonFolderPath(folder: string): string {
  return FOLDER.render({ folder })
}

export function parseCommonFolderPath(path: string) {
  return FOLDER.parse(path)
}

export function commonOrganizationPath(organization: string): string {
  return ORGANIZATION.render({ organization })
}

export function parseCommonOrganizationPath(path: string) {
  return ORGANIZATION.parse(path)
}

export function commonProjectPath(project: string): string {
  return PROJECT.render({ project })
}

export function parseCommonProjectPath(path: string) {
  return PROJECT.parse(path)
}

export function commonLocationPath(project: string, location: string): string {
  return LOCATION.render({ project, location })
}

export function parseCommonLocationPath(path: string) {
  return LOCATION.parse(path)
}
