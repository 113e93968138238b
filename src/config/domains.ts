/**
 * Domain Vocabulary
 *
 * Keyword lists, table-name patterns and corpus file layout for each
 * telemetry domain. The classifier and corpus loader read from here.
 */

import type { Domain } from '../core/types.js';

export interface DomainDefinition {
  domain: Domain;
  /** Human-readable name used in prompts */
  label: string;
  /** Whole-word keywords (lower case) */
  keywords: readonly string[];
  /** Canonical table / resource names; a match is a strong signal */
  tablePattern: RegExp;
  /** Tables a bare completion may not consist of */
  tables: readonly string[];
  /** Example files, relative to the corpus directory */
  exampleFiles: readonly string[];
  /** Capsule summary file, relative to the corpus directory */
  capsuleFile?: string;
  /** Helper function declarations, relative to the corpus directory */
  functionsFile?: string;
}

export const DOMAIN_DEFINITIONS: Record<Domain, DomainDefinition> = {
  appinsights: {
    domain: 'appinsights',
    label: 'Application Insights',
    keywords: [
      'application', 'applications', 'app', 'apps',
      'trace', 'traces', 'apptraces',
      'request', 'requests', 'apprequests',
      'dependency', 'dependencies', 'appdependencies',
      'exception', 'exceptions', 'appexceptions',
      'customevent', 'customevents',
    ],
    tablePattern: /\b(apprequests|appexceptions|apptraces|appdependencies|apppageviews|appcustomevents)\b/i,
    tables: ['AppRequests', 'AppExceptions', 'AppTraces', 'AppDependencies', 'AppPageViews', 'AppCustomEvents'],
    exampleFiles: [
      'appinsights/app_requests_kql_examples.md',
      'appinsights/app_exceptions_kql_examples.md',
      'appinsights/app_traces_kql_examples.md',
      'appinsights/app_performance_kql_examples.md',
    ],
    capsuleFile: 'appinsights/README.md',
  },
  containers: {
    domain: 'containers',
    label: 'Container Insights',
    keywords: [
      'container', 'containers', 'containerlogv2', 'containerlog',
      'pod', 'pods', 'namespace', 'namespaces',
      'kube', 'kubernetes', 'k8s',
      'crashloop', 'crashloopbackoff', 'restart', 'restarts',
      'stderr', 'latency', 'latencyms', 'stack trace', 'image',
      'workload', 'daemonset', 'statefulset', 'deployment',
      'pending', 'schedule', 'scheduling',
    ],
    tablePattern: /\b(containerlogv2|containerlog|kubepodinventory|kubepod|insightsmetrics|containerinventory|kubeevents?)\b/i,
    tables: ['ContainerLogV2', 'ContainerLog', 'KubePodInventory', 'KubeEvents', 'ContainerInventory', 'InsightsMetrics'],
    exampleFiles: ['containers/container_logs_kql_examples.md'],
    capsuleFile: 'containers/domain_capsule_containerlogs.txt',
    functionsFile: 'containers/kql_functions_containerlogs.kql',
  },
};

/**
 * Domain chosen when both domains match and neither carries a strong signal.
 */
export const CONFLICT_DEFAULT_DOMAIN: Domain = 'appinsights';

/**
 * Workspace-level tables that are never a complete answer on their own.
 */
export const GENERIC_TABLES: readonly string[] = ['Usage', 'Heartbeat', 'Event'];
