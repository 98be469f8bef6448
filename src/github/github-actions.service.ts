// src/github/github-actions.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosRequestConfig } from 'axios';
import { SETTINGS, Settings } from '../config/settings';
import { BuildConfig, buildWorkflowInputs } from '../build/build-config';
import {
  DispatchResult,
  RunLookup,
  workflowRunsResponseSchema,
} from './github.types';

const API_VERSION = '2022-11-28';

export const TRIGGERED_MESSAGE =
  'Workflow triggered successfully! Check the Actions tab in the GitHub repository.';

const errorText = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

const bodyText = (data: unknown) =>
  typeof data === 'string' ? data : JSON.stringify(data);

@Injectable()
export class GithubActionsService {
  private readonly logger = new Logger(GithubActionsService.name);

  constructor(@Inject(SETTINGS) private readonly settings: Settings) {}

  private get repoUrl() {
    const { apiBaseUrl, owner, repo } = this.settings.github;
    return `${apiBaseUrl}/repos/${owner}/${repo}`;
  }

  private requestConfig(): AxiosRequestConfig {
    return {
      headers: {
        Authorization: `Bearer ${this.settings.github.token}`,
        Accept: 'application/vnd.github+json',
        'X-GitHub-Api-Version': API_VERSION,
      },
      timeout: this.settings.github.timeoutMs,
      // non-2xx statuses are reported, not thrown
      validateStatus: () => true,
    };
  }

  /**
   * Sends one workflow_dispatch event. Never throws: remote rejections and
   * transport errors come back as a failed result.
   */
  async dispatchWorkflow(config: BuildConfig): Promise<DispatchResult> {
    const { workflowFile, dispatchRef } = this.settings.github;
    const url = `${this.repoUrl}/actions/workflows/${workflowFile}/dispatches`;
    const inputs = buildWorkflowInputs(config);
    const request: AxiosRequestConfig = {
      ...this.requestConfig(),
      responseType: 'text',
    };

    try {
      const response = await axios.post(
        url,
        { ref: dispatchRef, inputs },
        request,
      );

      if (response.status !== 204) {
        this.logger.warn(`Dispatch rejected with status ${response.status}`);
        return {
          succeeded: false,
          message: `GitHub API error: ${response.status} - ${bodyText(response.data)}`,
        };
      }
    } catch (error) {
      this.logger.error(`Dispatch request failed: ${errorText(error)}`);
      return {
        succeeded: false,
        message: `Error triggering workflow: ${errorText(error)}`,
      };
    }

    this.logger.log(`✅ Workflow ${workflowFile} dispatched on ${dispatchRef}`);

    const latest = await this.getLatestRun();
    if (latest.kind === 'found') {
      return {
        succeeded: true,
        message: `Monitor your build progress at:\n${latest.run.html_url}`,
      };
    }
    return { succeeded: true, message: TRIGGERED_MESSAGE };
  }

  /** Most recent run of the repository. Never throws. */
  async getLatestRun(): Promise<RunLookup> {
    try {
      const config: AxiosRequestConfig = {
        ...this.requestConfig(),
        params: { per_page: 1 },
      };
      const response = await axios.get(`${this.repoUrl}/actions/runs`, config);

      if (response.status !== 200) {
        this.logger.warn(`Run listing returned status ${response.status}`);
        return { kind: 'http-error', status: response.status };
      }

      const parsed = workflowRunsResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        this.logger.warn('Run listing returned an unexpected body');
        return { kind: 'error', message: 'Unexpected response from GitHub' };
      }

      const [run] = parsed.data.workflow_runs;
      return run ? { kind: 'found', run } : { kind: 'empty' };
    } catch (error) {
      this.logger.error(`Run listing failed: ${errorText(error)}`);
      return { kind: 'error', message: errorText(error) };
    }
  }
}
