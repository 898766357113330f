export type RuntimeEnv = {
  log: (message: string) => void;
  error: (message: string) => void;
};

export const defaultRuntime: RuntimeEnv = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};
