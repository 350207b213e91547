export type SchemaVersion = '1.0.0' | '2.0.0';

export type LegacyExerciseCategory = 'cardio' | 'muscle' | 'stretch';
export type EnergyExerciseCategory = 'physical' | 'mental' | 'sleepiness';
export type ExerciseCategory = LegacyExerciseCategory | EnergyExerciseCategory;

export type ExerciseUnit = 'reps' | 'sets' | 'minutes' | 'km' | 'hours';

export type TaskPriority = 0 | 1 | 2;

export type Exercise = {
  id: number;
  name: string;
  category: ExerciseCategory;
  color: string;
  targetValue: number;
  unit: ExerciseUnit;
  createdAt: string;
};

export type ExerciseLog = {
  id: number;
  exerciseId: number;
  date: string;
  completed: boolean;
  actualValue: number;
  notes: string;
  loggedAt: string;
};

export type Task = {
  id: number;
  title: string;
  isCompleted: boolean;
  date: string;
  dueDate: string | null;
  priority: TaskPriority;
  category: string | null;
  createdAt: string;
  completedAt: string | null;
};

export type CalendarEvent = {
  id: number;
  title: string;
  eventDate: string;
  description: string | null;
  createdAt: string;
};

export type DailyPoints = {
  date: string;
  physical: number;
  mental: number;
  score: number;
  updatedAt: string;
};

export type ScoreBand = 'None' | 'Very Low' | 'Low' | 'Moderate' | 'High' | 'Maximum';

export type ExerciseProgress = {
  exercise: Exercise;
  log: ExerciseLog | null;
  actualValue: number;
  completed: boolean;
  progressPercentage: number;
  displayPercentage: number;
  targetMet: boolean;
};

export type ExerciseSummary = {
  totalExercises: number;
  completedCount: number;
  completionRate: number;
  totalActual: number;
  totalTarget: number;
  progressRate: number;
};

export type TaskStatistics = {
  total: number;
  completed: number;
  pending: number;
  overdue: number;
  completionRate: number;
};

export type TaskGroup = {
  category: string;
  tasks: Task[];
  completedCount: number;
};

export type EventMonthSummary = {
  totalEvents: number;
  pastEvents: number;
  todayEvents: number;
  upcomingEvents: number;
  rangeStart: string;
  rangeEnd: string;
};

export type PointsMonthSummary = {
  year: number;
  month: number;
  recordedDays: number;
  averageScore: number | null;
  best: DailyPoints | null;
  worst: DailyPoints | null;
};

export type ApiErrorCode =
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'CONFLICT'
  | 'STORAGE_ERROR'
  | 'CONFIG_ERROR'
  | 'INTERNAL_ERROR';

export type ApiError = {
  code: ApiErrorCode;
  message: string;
};

export type ApiResponse<T> = { data: T; error: null } | { data: null; error: ApiError };

export type ExerciseInput = {
  name: string;
  category: ExerciseCategory;
  targetValue: number;
  unit: ExerciseUnit;
  color?: string;
};
