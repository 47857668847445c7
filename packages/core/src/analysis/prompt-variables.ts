export interface BuildFailurePromptVars {
  build: {
    pipeline: string;
    branch: string;
    command: string;
    exitStatus: string;
    phase: string;
  };
  logExcerpt: string;
  logCharBudget: number;
}
