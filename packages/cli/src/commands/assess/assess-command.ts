import { Command } from 'commander';
import type { Engine, Records } from '@tasking/core';
import { Utils } from '@tasking/core';
import { BaseCommand, errorMessage } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface AssessOptions extends BaseCommandOptions {
  org: string;
  config?: string;
  today?: string;
}

/**
 * Full evaluation of one task, as printed by `tasking assess --json`.
 */
export interface AssessmentReport {
  taskId: string;
  title: string;
  evaluatedOn: string;
  priority: Engine.PriorityBreakdown;
  routing: Records.RoutingRecommendation;
  authorities: Records.AuthoritySuggestion[];
  risk: Records.RiskInsight;
  quality: Records.QualityCheckResult;
}

/**
 * AssessCommand - runs every engine component over a task file.
 */
export class AssessCommand extends BaseCommand<AssessOptions> {

  register(program: Command): void {
    program
      .command('assess <taskFile>')
      .description('Score, route and assess a task file against an org directory')
      .requiredOption('-o, --org <directoryFile>', 'Org directory file (YAML or JSON) with orgUnits and authorities')
      .option('-c, --config <file>', 'Engine config override (defaults to $TASKING_ENGINE_CONFIG or bundled tables)')
      .option('-t, --today <date>', 'Evaluate as of this date (YYYY-MM-DD)')
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Show technical details on errors')
      .option('-q, --quiet', 'Suppress report output')
      .action(async (taskFile: string, options: AssessOptions) => {
        await this.executeAssess(taskFile, options);
      });
  }

  async executeAssess(taskFile: string, options: AssessOptions): Promise<void> {
    let today = new Date();
    if (options.today !== undefined) {
      const epoch = Utils.parseIsoDate(options.today);
      if (epoch === null) {
        this.handleError(`Invalid --today date '${options.today}'; expected YYYY-MM-DD`, options);
        return;
      }
      today = new Date(epoch);
    }

    try {
      const { task, engine } = await this.container.loadWorkspace({
        taskFile,
        orgFile: options.org,
        ...(options.config !== undefined ? { configFile: options.config } : {}),
      });

      const priority = engine.explainScore(task, today);
      const scored = { ...task, priorityScore: priority.score };
      const report: AssessmentReport = {
        taskId: task.id,
        title: task.title,
        evaluatedOn: Utils.formatIsoDate(today),
        priority,
        routing: await engine.recommendOrgUnit(scored),
        authorities: await engine.suggestAuthorities(scored),
        risk: engine.assessRisk(scored),
        quality: engine.checkQuality(scored),
      };

      this.handleSuccess(report, options, `Assessed task ${task.id}`, formatReport(report));
    } catch (error) {
      this.handleError(
        `Failed to assess task: ${errorMessage(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}

export function formatReport(report: AssessmentReport): string {
  const { priority, routing, risk, quality } = report;
  const lines = [
    `📋 ${report.taskId}: ${report.title} (as of ${report.evaluatedOn})`,
    '',
    `Priority:  ${priority.score.toFixed(2)}`,
    `  urgency ${priority.urgency} (${priority.daysRemaining ?? '?'} days), originator ${priority.originator}, ` +
    `keywords ${priority.keywordBoost}, status ${priority.status}`,
    `Routing:   ${routing.orgUnitId} - ${routing.rationale}`,
    'Authorities:',
    ...report.authorities.map((suggestion, index) =>
      `  ${index + 1}. ${suggestion.title} [${suggestion.authorityId}, ${suggestion.grade}] ` +
      `confidence ${suggestion.confidence.toFixed(2)} - ${suggestion.rationale}`
    ),
    `Risk:      ${risk.riskLevel.toUpperCase()} (late probability ${risk.lateProbability})`,
    ...risk.drivers.map(driver => `  - ${driver}`),
    `  Actions: ${risk.recommendedActions.join('; ')}`,
    `Quality:   ${quality.passed ? 'PASSED' : 'FAILED'}`,
    ...quality.issues.map(issue => `  - [${issue.severity}] ${issue.code}: ${issue.message}`),
  ];
  return lines.join('\n');
}
