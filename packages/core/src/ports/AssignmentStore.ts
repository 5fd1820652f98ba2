import type { Assignment, Cycle, Question, Region } from '../domain/models';

export interface ActiveAssignment {
  cycle: Cycle;
  assignment: Assignment;
}

export interface RotationCommit {
  /** Id of the cycle that must still be active for the commit to apply; `null` when bootstrapping. */
  expectedActiveCycleId: number | null;
  cycle: Cycle;
  assignments: Assignment[];
}

export interface AssignmentStore {
  getActiveCycle(): Promise<Cycle | null>;
  listRegions(): Promise<Region[]>;
  regionExists(regionId: string): Promise<boolean>;
  listEligibleQuestions(regionId: string): Promise<Question[]>;
  /** Question ids assigned to the region, oldest cycle first. */
  getAssignmentHistory(regionId: string): Promise<string[]>;
  getActiveAssignment(regionId: string): Promise<ActiveAssignment | null>;
  /**
   * Deactivates the expected cycle, inserts the new one and all of its assignments in one
   * all-or-nothing write. Throws `RotationConflictError` when the expected cycle is no longer active.
   */
  commitRotation(commit: RotationCommit): Promise<void>;
}

export interface CatalogWriter {
  putRegion(region: Region): Promise<void>;
  /** Throws `QuestionAlreadyExistsError` when the id is taken. */
  putQuestion(question: Question): Promise<void>;
  addEligibility(regionId: string, questionId: string): Promise<void>;
}
