export type ProgressReporter = {
  step: (message: string) => void;
  success: (message: string) => void;
  warn: (message: string) => void;
};

export const silentProgress: ProgressReporter = {
  step() {},
  success() {},
  warn() {},
};
