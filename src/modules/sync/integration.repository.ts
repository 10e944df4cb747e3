import { LmsIntegrationConfig } from './interfaces/sync.interface';

/** Read-only view of configured LMS integrations. */
export abstract class IntegrationRepository {
  abstract findByCourse(courseRef: string): Promise<LmsIntegrationConfig[]>;
  abstract findById(id: string): Promise<LmsIntegrationConfig | null>;
}
