export { WeeklyActivityDemo } from "./WeeklyActivityDemo";
export { formatDay, formatWeekRange, sampleActivity, seededRandom, startOfWeek } from "./weekRange";
export type { ActivitySample, DailyCount, WeekRangeFormat } from "./weekRange";
