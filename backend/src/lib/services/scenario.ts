import {
  ScenarioType,
  type Scenario,
  type TargetRecord,
  type WorkingCompany,
} from '@tempscore/shared';

type TargetTransform = (target: TargetRecord) => TargetRecord;

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

function targetTransform(scenario: Scenario): TargetTransform {
  switch (scenario.type) {
    case ScenarioType.SHIFT_TARGET_YEAR: {
      const { targetYear } = scenario;
      return (target) => ({ ...target, endYear: targetYear });
    }
    case ScenarioType.SCALE_AMBITION: {
      const { factor } = scenario;
      return (target) => ({
        ...target,
        reductionAmbition: clamp(target.reductionAmbition * factor, 0, 1),
      });
    }
    case ScenarioType.MINIMUM_AMBITION: {
      const { floor } = scenario;
      return (target) => ({
        ...target,
        reductionAmbition: Math.max(target.reductionAmbition, floor),
      });
    }
  }
}

/**
 * Apply a what-if scenario to already validated targets. Only target years
 * and ambitions change; target selection and statuses are left as they are.
 * Without a scenario the input array itself is returned.
 */
export function applyScenario(
  scenario: Scenario | null | undefined,
  companies: WorkingCompany[]
): WorkingCompany[] {
  if (!scenario) return companies;

  const transform = targetTransform(scenario);
  return companies.map((company) => ({
    ...company,
    targets: company.targets.map(transform),
  }));
}
