import type { CatalogClient } from "../services/catalog.service";
import type { Mosaic, RemoteJobStatus, SubmissionRequest } from "../models/catalog.model";
import type { Scene } from "../models/scene.model";

/** Scripted catalog: statuses are served in order, submissions recorded. */
export class FakeCatalog implements CatalogClient {
  scenes: Scene[] = [];
  mosaics: Mosaic[] = [];
  statuses: RemoteJobStatus[] = [];
  submitted: SubmissionRequest[] = [];
  searches: Array<{ start: string; end: string; bundle: string }> = [];
  failSearchFor?: string;
  private nextId = 1;

  async search(aoi: unknown, start: string, end: string, bundle: string): Promise<Scene[]> {
    this.searches.push({ start, end, bundle });
    if (this.failSearchFor && start.startsWith(this.failSearchFor)) {
      throw new Error(`search failed for ${start}`);
    }
    return this.scenes;
  }

  async submit(request: SubmissionRequest): Promise<string> {
    this.submitted.push(request);
    return `job-${this.nextId++}`;
  }

  async status(jobId: string): Promise<RemoteJobStatus> {
    const status = this.statuses.shift();
    if (!status) {
      throw new Error(`No status scripted for ${jobId}`);
    }
    return status;
  }

  async listMosaics(): Promise<Mosaic[]> {
    return this.mosaics;
  }
}
