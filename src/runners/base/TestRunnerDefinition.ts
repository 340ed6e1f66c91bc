export type ExitInterpretation = 'success' | 'test-failure' | 'system-error';

/** A test picked for a subset run. NodeId fits this shape. */
export interface TestSelection {
  /** Source file relative to the root */
  readonly filePath: string;
  /** Name the engine filters by: suite chain and test name */
  readonly fullName: string;
}

/**
 * How to recognise, launch and read the exit status of one test engine.
 */
export interface TestRunnerDefinition {
  /** The name of the test runner */
  name: string;

  /**
   * Check if the given command and package.json content belong to this runner
   */
  matches(args: string[], packageJsonContent?: string): boolean;

  /**
   * Build the command with the reporter adapter injected. A non-empty
   * selection narrows the run to those tests.
   */
  buildMainCommand(args: string[], adapterPath: string, selection?: readonly TestSelection[]): string[];

  /**
   * File name of the adapter module, given the extension this build runs from
   */
  getAdapterFileName(extension: string): string;

  /**
   * Interpret the exit code from the test runner; null means killed by a signal
   */
  interpretExitCode(exitCode: number | null): ExitInterpretation;
}
