export const throttle = (ms: number): Promise<void> =>
  ms > 0
    ? new Promise<void>((res) => setTimeout(res, ms))
    : Promise.resolve();
