import type { TemplateConfig } from '@examplecheck/shared';
import { fetchTemplate } from './archive';
import { pruneTemplate } from './prune';

export interface ProvisionResult {
  url: string;
  version: string;
  removed: string[];
}

/**
 * Populates a workspace from the template archive and strips the parts of the
 * template that the verification build must not see.
 */
export class WorkspaceProvisioner {
  constructor(private readonly template: TemplateConfig) {}

  async provision(workspaceDir: string): Promise<ProvisionResult> {
    const url = await fetchTemplate(this.template, workspaceDir, this.template.stripComponents);
    const removed = await pruneTemplate(workspaceDir, this.template.prune);
    return { url, version: this.template.version, removed };
  }
}
