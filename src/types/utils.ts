// Utility types

// Injectable time sources, swapped for fakes in tests
export type SleepFn = (ms: number) => Promise<void>;
export type ClockFn = () => number;
