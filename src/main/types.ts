export type Category = 'chinese' | 'english' | 'number' | 'symbol' | 'other'

export interface CategoryCounts {
  chinese: number
  english: number
  number: number
  symbol: number
  other: number
  total: number
}

/**
 * One accepted character, classified at the moment it was typed.
 */
export interface ClassifiedEvent {
  category: Category
  timestamp: number
}

export interface CharacterInfo {
  char: string
  category: Category
  codePoint: number | null
  hex: string | null
}

export interface DailyRecord extends CategoryCounts {
  date: string
  sessionCount: number
  createdAt: number
  updatedAt: number
}

export interface HourlyRecord extends CategoryCounts {
  date: string
  hour: number
  createdAt: number
  updatedAt: number
}

export interface SessionRecord extends CategoryCounts {
  sessionId: string
  startTime: number
  endTime: number | null
  updatedAt: number
}

/** Unflushed counts for one (date) or (date, hour) bucket. */
export interface DailyDelta {
  date: string
  counts: CategoryCounts
}

export interface HourlyDelta {
  date: string
  hour: number
  counts: CategoryCounts
}

export interface SessionDelta {
  sessionId: string
  counts: CategoryCounts
}

/** Everything one flush writes, applied as a single transaction. */
export interface FlushBatch {
  daily: DailyDelta[]
  hourly: HourlyDelta[]
  session: SessionDelta | null
  flushedAt: number
}

export interface PeriodSummary extends CategoryCounts {
  startDate: string
  endDate: string
  sessionCount: number
  activeDays: number
}

export interface TrendPoint extends CategoryCounts {
  date: string
}

export interface TrendAnalysis {
  days: number
  startDate: string
  endDate: string
  points: TrendPoint[]
  total: number
  dailyAverage: number
}

export interface HourlyBreakdownEntry extends CategoryCounts {
  hour: number
}

export interface OverallSummary {
  totalDays: number
  totalChinese: number
  totalEnglish: number
  totalChars: number
  avgChinese: number
  avgEnglish: number
  avgTotal: number
  firstDate: string | null
  lastDate: string | null
}
