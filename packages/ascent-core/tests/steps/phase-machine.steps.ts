/**
 * Step Definitions for Phase Machine Transitions Feature
 */
import { fileURLToPath } from "node:url";
import { loadFeature, describeFeature } from "@amiceli/vitest-cucumber";
import { expect } from "vitest";
import { definePhaseMachine, PhaseTransitionError, type PhaseMachine } from "../../src/index.js";

type TestPhase = "idle" | "running" | "stopped" | "archived";

const TEST_PHASES: readonly TestPhase[] = ["idle", "running", "stopped", "archived"];

function toPhase(value: string): TestPhase {
  const phase = TEST_PHASES.find((candidate) => candidate === value);
  if (phase === undefined) {
    throw new Error(`Unknown test phase: ${value}`);
  }
  return phase;
}

// ============================================================================
// Test State
// ============================================================================

interface ScenarioState {
  machine: PhaseMachine<TestPhase> | null;
  allowed: boolean | null;
  lastError: unknown;
}

let state: ScenarioState | null = null;

function getState(): ScenarioState {
  if (state === null) {
    throw new Error("Scenario state is not initialized");
  }
  return state;
}

function getMachine(): PhaseMachine<TestPhase> {
  const { machine } = getState();
  if (machine === null) {
    throw new Error("No phase machine in this scenario");
  }
  return machine;
}

// ============================================================================
// Feature Tests
// ============================================================================

const feature = await loadFeature(
  fileURLToPath(new URL("../features/behavior/phase-machine.feature", import.meta.url))
);

describeFeature(feature, ({ Scenario, ScenarioOutline, Background, AfterEachScenario }) => {
  AfterEachScenario(() => {
    state = null;
  });

  Background(({ Given }) => {
    Given(
      'a phase machine starting at "idle" with transitions:',
      (_ctx: unknown, table: Array<{ from: string; allowedTo: string }>) => {
        const transitions: Record<TestPhase, TestPhase[]> = {
          idle: [],
          running: [],
          stopped: [],
          archived: [],
        };
        for (const row of table) {
          transitions[toPhase(row.from)] = row.allowedTo
            .split(",")
            .map((phase) => phase.trim())
            .filter((phase) => phase.length > 0 && phase !== "(terminal)")
            .map(toPhase);
        }

        state = {
          machine: definePhaseMachine<TestPhase>({ initial: "idle", transitions }),
          allowed: null,
          lastError: null,
        };
      }
    );
  });

  ScenarioOutline(
    "Declared transitions are allowed",
    ({ When, Then }, variables) => {
      When('checking the transition from "<from>" to "<to>"', () => {
        getState().allowed = getMachine().canTransition(
          toPhase(variables.from),
          toPhase(variables.to)
        );
      });

      Then("the transition is allowed", () => {
        expect(getState().allowed).toBe(true);
      });
    }
  );

  ScenarioOutline(
    "Undeclared transitions are rejected",
    ({ When, Then }, variables) => {
      When('asserting the transition from "<from>" to "<to>"', () => {
        try {
          getMachine().assertTransition(toPhase(variables.from), toPhase(variables.to));
        } catch (error) {
          getState().lastError = error;
        }
      });

      Then('a PhaseTransitionError is thrown listing "<valid>"', () => {
        const error = getState().lastError;
        expect(error).toBeInstanceOf(PhaseTransitionError);
        if (!(error instanceof PhaseTransitionError)) return;
        expect(error.code).toBe("PHASE_INVALID_TRANSITION");
        expect(error.message).toBe(
          `Invalid phase transition from "${variables.from}" to "${variables.to}". Valid transitions: ${variables.valid}`
        );
      });
    }
  );

  Scenario("Phases are classified by their transitions", ({ Then, And }) => {
    Then("{string} is terminal", (_ctx: unknown, phase: string) => {
      expect(getMachine().isTerminal(toPhase(phase))).toBe(true);
    });

    And("{string} is absorbing", (_ctx: unknown, phase: string) => {
      expect(getMachine().isAbsorbing(toPhase(phase))).toBe(true);
    });

    And("{string} is neither terminal nor absorbing", (_ctx: unknown, phase: string) => {
      expect(getMachine().isTerminal(toPhase(phase))).toBe(false);
      expect(getMachine().isAbsorbing(toPhase(phase))).toBe(false);
    });
  });
});
