/**
 * Herald — GitHub Client
 *
 * One authenticated Octokit shared by the repository source and the blog
 * destination.
 */

import { Octokit } from 'octokit';
import { requireSetting, type AppConfig } from './config';

let octokit: Octokit | null = null;

export function getOctokit(config: AppConfig): Octokit {
  if (!octokit) {
    octokit = new Octokit({ auth: requireSetting(config, 'GITHUB_TOKEN') });
  }
  return octokit;
}
