export const getProjectRoot = (): string => {
  const envRoot = process.env.QUEUEBOARD_ROOT;
  if (envRoot && envRoot.trim().length > 0) {
    return envRoot;
  }
  return process.cwd();
};
