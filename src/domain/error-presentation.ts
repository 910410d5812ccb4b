/**
 * Error presentation for people reading client failures.
 *
 * Maps TypedError codes to a title, a plain-language message and concrete
 * next steps, and renders any thrown value as a single summary line.
 */

import { TypedError, WorkflowClientError, errorMessage } from './errors';

export type ErrorSeverity = 'info' | 'warning' | 'error';

export interface ErrorPresentation {
  severity: ErrorSeverity;
  title: string;
  userMessage: string;
  /** Multi-line dump of the typed payload. */
  technicalDetails: string;
  retryable: boolean;
  suggestedActions: string[];
  errorCode: string;
  nodeId?: number;
  jobId?: string;
}

/**
 * Code patterns use prefix matching: 'TRANSPORT' matches 'TRANSPORT.HTTP',
 * 'TRANSPORT.REJECTED', and so on. Rules are tried in order.
 */
export interface ErrorPresentationRule {
  codePrefix: string;
  severity: ErrorSeverity;
  /** May use {message}, {nodeId}, {jobId}. */
  titleTemplate: string;
  messageTemplate: string;
  /** Overrides TypedError.retryable when set. */
  retryable?: boolean;
  suggestedActions: string[];
}

export const DEFAULT_ERROR_PRESENTATION_RULES: ErrorPresentationRule[] = [
  {
    codePrefix: 'GRAPH.UI_FORMAT',
    severity: 'error',
    titleTemplate: 'Editor-format Workflow',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: ['Save the workflow with "Export (API)" in the editor'],
  },
  {
    codePrefix: 'GRAPH.AMBIGUOUS',
    severity: 'error',
    titleTemplate: 'Ambiguous Node Reference',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: ['Look the node up by id', 'Give the nodes distinct titles'],
  },
  {
    codePrefix: 'GRAPH',
    severity: 'error',
    titleTemplate: 'Invalid Workflow Graph',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: ['Check node ids, property names and links in the workflow'],
  },
  {
    codePrefix: 'TRANSPORT.REJECTED',
    severity: 'error',
    titleTemplate: 'Workflow Rejected by Server',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: [
      'Inspect the per-node errors reported by the server',
      'Check that every referenced model file is installed on the server',
    ],
  },
  {
    codePrefix: 'TRANSPORT',
    severity: 'error',
    titleTemplate: 'Server Unreachable',
    messageTemplate: '{message}',
    suggestedActions: ['Check that the server is running and the URL is correct'],
  },
  {
    codePrefix: 'PROVISIONING',
    severity: 'error',
    titleTemplate: 'Worker Unavailable',
    messageTemplate: '{message}',
    suggestedActions: ['Verify the remote provider credentials and capacity'],
  },
  {
    codePrefix: 'SESSION.TIMEOUT',
    severity: 'warning',
    titleTemplate: 'Job Timed Out',
    messageTemplate: 'Job {jobId} did not finish in time and was cancelled.',
    suggestedActions: ['Increase the wait timeout', 'Reduce the workload (resolution, steps, batch size)'],
  },
  {
    codePrefix: 'CONFIG',
    severity: 'error',
    titleTemplate: 'Invalid Configuration',
    messageTemplate: '{message}',
    retryable: false,
    suggestedActions: ['Review the client configuration and COMFY_* environment variables'],
  },
];

/** Present a TypedError, using the first rule whose prefix matches its code. */
export function presentError(
  error: TypedError,
  rules: ErrorPresentationRule[] = DEFAULT_ERROR_PRESENTATION_RULES,
): ErrorPresentation {
  const rule = rules.find((r) => error.code.startsWith(r.codePrefix));
  const fixes = error.suggestedFixes.map((f) => f.description ?? `Apply fix: ${f.type}`);

  if (rule) {
    return {
      severity: rule.severity,
      title: interpolate(rule.titleTemplate, error),
      userMessage: interpolate(rule.messageTemplate, error),
      technicalDetails: formatTechnicalDetails(error),
      retryable: rule.retryable ?? error.retryable,
      suggestedActions: [...rule.suggestedActions, ...fixes],
      errorCode: error.code,
      nodeId: error.nodeId,
      jobId: error.jobId,
    };
  }

  return {
    severity: 'error',
    title: 'Error',
    userMessage: error.message,
    technicalDetails: formatTechnicalDetails(error),
    retryable: error.retryable,
    suggestedActions: fixes,
    errorCode: error.code,
    nodeId: error.nodeId,
    jobId: error.jobId,
  };
}

/**
 * One-line summary of any thrown value, e.g.
 * `[GRAPH.AMBIGUOUS] 2 nodes share the name "Prompt" (ids 6, 7) (try: Resolve the node by its id instead)`.
 */
export function formatError(err: unknown): string {
  if (!(err instanceof WorkflowClientError)) return errorMessage(err);
  const presentation = presentError(err.typedError);
  const line = `[${presentation.errorCode}] ${err.typedError.message}`;
  const fixes = err.typedError.suggestedFixes
    .map((f) => f.description)
    .filter((d): d is string => d !== undefined);
  const hints = fixes.length > 0 ? fixes : presentation.suggestedActions.slice(0, 1);
  return hints.length > 0 ? `${line} (try: ${hints.join('; ')})` : line;
}

function interpolate(template: string, error: TypedError): string {
  return template
    .replace(/\{message\}/g, error.message)
    .replace(/\{nodeId\}/g, error.nodeId !== undefined ? String(error.nodeId) : 'unknown')
    .replace(/\{jobId\}/g, error.jobId ?? 'unknown');
}

function formatTechnicalDetails(error: TypedError): string {
  const parts: string[] = [
    `Code: ${error.code}`,
    `Message: ${error.message}`,
    `Retryable: ${error.retryable}`,
  ];
  if (error.nodeId !== undefined) parts.push(`Node: ${error.nodeId}`);
  if (error.jobId) parts.push(`Job: ${error.jobId}`);
  if (error.details) {
    parts.push(`Details: ${JSON.stringify(error.details, null, 2)}`);
  }
  if (error.suggestedFixes.length > 0) {
    parts.push(`Fixes: ${error.suggestedFixes.map((f) => f.type).join(', ')}`);
  }
  return parts.join('\n');
}
