import { NewsIngestionJob } from '../jobs/news-ingestion-job';
import { MetricsTracker } from '../jobs/metrics-tracker';
import { DocumentStore } from '../storage/document-store';

/**
 * Services shared by the HTTP handlers
 */
export interface AppContext {
  store: DocumentStore;
  job: NewsIngestionJob;
  metrics: MetricsTracker;
  adminApiKey?: string;
  frontendUrl?: string;
  production?: boolean;
  /** Connectivity check for the backing store, when it has one */
  pingStore?: () => Promise<boolean>;
  /** Whether request lines are written to the console */
  logRequests?: boolean;
}
