export {
  hasErrorViolations,
  type MazeValidationResult,
  type ValidationFailure,
  type ValidationSuccess,
  type Violation,
  type ViolationSeverity,
} from "./result-types";
export { validateMaze } from "./validate-maze";
