import type { Exercise, ExerciseLog, ExerciseProgress, ExerciseSummary } from './types';

function roundOne(value: number): number {
  return Math.round(value * 10) / 10;
}

export function progressPercentage(actualValue: number, targetValue: number): number {
  if (targetValue <= 0) return 0;
  return roundOne((actualValue / targetValue) * 100);
}

export function toExerciseProgress(exercise: Exercise, log: ExerciseLog | null): ExerciseProgress {
  const actualValue = log?.actualValue ?? 0;
  const percentage = progressPercentage(actualValue, exercise.targetValue);
  return {
    exercise,
    log,
    actualValue,
    completed: log?.completed ?? false,
    progressPercentage: percentage,
    displayPercentage: Math.min(percentage, 100),
    targetMet: actualValue >= exercise.targetValue,
  };
}

export function summarizeProgress(items: ExerciseProgress[]): ExerciseSummary {
  if (items.length === 0) {
    return {
      totalExercises: 0,
      completedCount: 0,
      completionRate: 0,
      totalActual: 0,
      totalTarget: 0,
      progressRate: 0,
    };
  }

  const completedCount = items.filter(item => item.completed).length;
  const totalActual = items.reduce((total, item) => total + item.actualValue, 0);
  const totalTarget = items.reduce((total, item) => total + item.exercise.targetValue, 0);

  return {
    totalExercises: items.length,
    completedCount,
    completionRate: roundOne((completedCount / items.length) * 100),
    totalActual,
    totalTarget,
    progressRate: totalTarget > 0 ? roundOne((totalActual / totalTarget) * 100) : 0,
  };
}
