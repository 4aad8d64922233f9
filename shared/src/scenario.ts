import type { ScenarioType } from './enums.js';

interface ScenarioBase {
  name?: string;
}

// Every target is moved to the same target year
export interface ShiftTargetYearScenario extends ScenarioBase {
  type: typeof ScenarioType.SHIFT_TARGET_YEAR;
  targetYear: number;
}

// Every target's ambition is multiplied by a factor (clamped to [0, 1])
export interface ScaleAmbitionScenario extends ScenarioBase {
  type: typeof ScenarioType.SCALE_AMBITION;
  factor: number;
}

// Every target's ambition is raised to at least the floor
export interface MinimumAmbitionScenario extends ScenarioBase {
  type: typeof ScenarioType.MINIMUM_AMBITION;
  floor: number;
}

export type Scenario =
  | ShiftTargetYearScenario
  | ScaleAmbitionScenario
  | MinimumAmbitionScenario;
