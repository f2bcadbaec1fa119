/**
 * Notify Module
 *
 * Tracker notifier variants behind one gateway, plus failure classification.
 */

export {
  type ConstructionFailure,
  type DeliveryFailure,
  type DeliveryReason,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  type NotificationOutcome,
  type Notifier,
  type NotifyFailure,
} from './types.js';

export { classifyFailure, failedOutcome, isRetryableStatus } from './classifier.js';

export { DeliveryAbortedError, createFetchTransport, deliver } from './httpTransport.js';

export {
  type NotifierGateway,
  type NotifierGatewayOptions,
  type NotifyContext,
  createNotifier,
  createNotifierGateway,
} from './gateway.js';

export { JIRA_MAX_DESCRIPTION, JIRA_MAX_SUMMARY, createJiraNotifier } from './jiraNotifier.js';

export { GITHUB_API_URL, GITHUB_MAX_TITLE, createGithubNotifier } from './githubNotifier.js';
