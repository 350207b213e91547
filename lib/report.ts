import { rawPoints, scoreBand } from './score';
import { isoDateSchema, parseInput } from './validation';
import type { EnergyStore } from './store';
import type { DailyPoints, ExerciseProgress, ExerciseSummary, ScoreBand, TaskStatistics } from './types';

export type DailyReport = {
  date: string;
  points: (DailyPoints & { band: ScoreBand }) | null;
  exercises: ExerciseProgress[];
  exerciseSummary: ExerciseSummary;
  tasks: TaskStatistics;
};

export function buildDailyReport(store: EnergyStore, date: string = store.today()): DailyReport {
  const day = parseInput(isoDateSchema, date);
  const points = store.points.find(day);

  return {
    date: day,
    points: points ? { ...points, band: scoreBand(points.score) } : null,
    exercises: store.exercises.getDailyProgress(day),
    exerciseSummary: store.exercises.getSummaryForDate(day),
    tasks: store.tasks.getStatistics(day),
  };
}

export function formatDailyReport(report: DailyReport): string {
  const lines = [`Energy report for ${report.date}`, ''];

  if (report.points) {
    const { score, band, physical, mental } = report.points;
    lines.push(
      `Score: ${score}/100 (${band})`,
      `Physical: ${physical}/10 | Mental: ${mental}/10 | Points: ${rawPoints(physical, mental)}/20`
    );
  } else {
    lines.push('Score: not recorded');
  }

  lines.push('', 'Exercises:');
  if (report.exercises.length === 0) {
    lines.push('  (none)');
  }
  for (const item of report.exercises) {
    const mark = item.completed ? 'x' : ' ';
    lines.push(
      `  [${mark}] ${item.exercise.name}: ${item.actualValue}/${item.exercise.targetValue} ${item.exercise.unit} (${item.progressPercentage.toFixed(1)}%)`
    );
  }
  const summary = report.exerciseSummary;
  lines.push(`  Completed ${summary.completedCount}/${summary.totalExercises} (${summary.completionRate.toFixed(1)}%)`);

  const tasks = report.tasks;
  lines.push(
    '',
    `Tasks: ${tasks.completed}/${tasks.total} done (${tasks.completionRate.toFixed(1)}%), ${tasks.pending} pending, ${tasks.overdue} overdue`
  );

  return lines.join('\n');
}
