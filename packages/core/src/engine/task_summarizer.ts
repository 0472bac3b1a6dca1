import type { RiskLevel, TaskSummary } from '../record_types';
import { assertPresent } from '../errors';
import type { ScoredTaskSnapshot } from './risk_assessor';

/** In code points */
const SNIPPET_LENGTH = 80;
const TAG_PREVIEW = 3;

/**
 * Template summary of a task and its comment thread. No external calls.
 *
 * The summary's risk level uses its own cut-offs (red ≥ 0.8, amber ≥ 0.5)
 * and is independent of RiskAssessor.
 */
export class TaskSummarizer {
  summarize(task: ScoredTaskSnapshot, comments: string[] = []): TaskSummary {
    assertPresent(task, 'TaskSummarizer.summarize', 'task');

    const keyPoints: string[] = [];
    if (task.priorityScore >= 0.8) {
      keyPoints.push('High priority task');
    }
    if (task.suspenseDate) {
      keyPoints.push(`Due ${task.suspenseDate}`);
    }
    if (task.tags.length > 0) {
      keyPoints.push(`Tags: ${task.tags.slice(0, TAG_PREVIEW).join(', ')}`);
    }
    const [firstComment] = comments;
    if (firstComment !== undefined) {
      keyPoints.push(`Recent feedback snippets: ${Array.from(firstComment).slice(0, SNIPPET_LENGTH).join('')}...`);
    }

    return {
      taskId: task.id,
      summary: `Task ${task.id} from ${task.originator} focuses on ${task.title}. ` +
        `Classification ${task.classification}. Priority score ${String(task.priorityScore)}.`,
      riskLevel: summaryRiskLevel(task.priorityScore),
      keyPoints,
    };
  }
}

function summaryRiskLevel(score: number): RiskLevel {
  if (score >= 0.8) return 'red';
  if (score >= 0.5) return 'amber';
  return 'green';
}
