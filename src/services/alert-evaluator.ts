import { CATEGORIES, type AlertBatch, type AlertGroup, type Category, type Finding } from "../types"

/**
 * Builds the alert for the findings created in this cycle, or null when none
 * of them falls in an alertable category.
 */
export function evaluateAlerts(
  newFindings: readonly Finding[],
  alertCategories: ReadonlySet<Category> | readonly Category[],
): AlertBatch | null {
  const alertable = new Set<Category>(alertCategories)
  const byCategory = new Map<Category, Finding[]>()

  for (const finding of newFindings) {
    if (!alertable.has(finding.category)) {
      continue
    }

    const bucket = byCategory.get(finding.category)
    if (bucket) {
      bucket.push(finding)
    } else {
      byCategory.set(finding.category, [finding])
    }
  }

  if (byCategory.size === 0) {
    return null
  }

  const groups: AlertGroup[] = []
  for (const category of CATEGORIES) {
    const findings = byCategory.get(category)
    if (findings) {
      // Array.prototype.sort is stable, so equal timestamps keep persist order.
      groups.push({ category, findings: [...findings].sort((a, b) => a.timestamp - b.timestamp) })
    }
  }

  return {
    findings: groups.flatMap((group) => group.findings),
    triggeredCategories: new Set(groups.map((group) => group.category)),
    groups,
  }
}
