import {
  SCOPE_ORDER,
  TIME_FRAME_ORDER,
  TargetStatus,
  type ScopeCategory,
  type TargetRecord,
  type TimeFrame,
  type WorkingCompany,
} from '@tempscore/shared';

export interface ValidateTargetsOptions {
  evaluationDate: Date;
}

// A target whose scope and time frame are known
export type UsableTarget = TargetRecord & { scope: ScopeCategory; timeFrame: TimeFrame };

export function isUsableTarget(target: TargetRecord, evaluationYear: number): target is UsableTarget {
  const { scope, timeFrame, status, baseYear, endYear, reductionAmbition } = target;
  if (scope === null || timeFrame === null) return false;
  if (status === TargetStatus.EXPIRED) return false;
  if (baseYear === null || endYear === null) return false;
  if (!Number.isInteger(baseYear) || !Number.isInteger(endYear)) return false;
  if (endYear <= baseYear || endYear < evaluationYear) return false;
  return Number.isFinite(reductionAmbition) && reductionAmbition >= 0 && reductionAmbition <= 1;
}

/**
 * Preference order between two usable targets for the same scope and time
 * frame. Negative means `a` is preferred.
 */
export function compareTargets(a: TargetRecord, b: TargetRecord): number {
  const validated =
    Number(b.status === TargetStatus.VALIDATED) - Number(a.status === TargetStatus.VALIDATED);
  if (validated !== 0) return validated;

  const baseYear = (b.baseYear ?? 0) - (a.baseYear ?? 0);
  if (baseYear !== 0) return baseYear;

  const ambition = b.reductionAmbition - a.reductionAmbition;
  if (ambition !== 0) return ambition;

  return (a.endYear ?? 0) - (b.endYear ?? 0);
}

function slotIndex(target: UsableTarget): number {
  return (
    SCOPE_ORDER.indexOf(target.scope) * TIME_FRAME_ORDER.length +
    TIME_FRAME_ORDER.indexOf(target.timeFrame)
  );
}

/**
 * Reduce each company's targets to at most one usable target per scope and
 * time frame. Companies left without targets are kept; they are scored with
 * the fallback score.
 */
export function validateTargets(
  companies: readonly WorkingCompany[],
  options: ValidateTargetsOptions
): WorkingCompany[] {
  const evaluationYear = options.evaluationDate.getUTCFullYear();

  return companies.map((company) => {
    const best = new Map<number, UsableTarget>();
    for (const target of company.targets) {
      if (!isUsableTarget(target, evaluationYear)) continue;
      const slot = slotIndex(target);
      const current = best.get(slot);
      if (!current || compareTargets(target, current) < 0) {
        best.set(slot, target);
      }
    }

    const targets = [...best.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, target]) => target);
    return { ...company, targets };
  });
}
