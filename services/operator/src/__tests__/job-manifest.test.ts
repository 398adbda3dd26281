import { describe, it, expect } from 'vitest';
import { buildJobManifest, jobNameFor } from '../job-manifest.js';
import { researchSessionProfile, siteUrl, staticSiteProfile, timestamp } from '../profiles.js';
import { decodeStaticSiteSpec } from '../resource-spec.js';
import { NOW, envOf, testConfig } from './helpers/fakes.js';

describe('jobNameFor', () => {
  it('appends the suffix and the unix time', () => {
    expect(jobNameFor('docs', 'build', NOW)).toBe('docs-build-1772366400');
    expect(jobNameFor('docs', 'build', new Date('2026-03-01T12:00:30Z'))).toBe('docs-build-1772366430');
  });

  it('shortens long object names to fit the label limit', () => {
    const name = jobNameFor(`${'a'.repeat(50)}-site-name`, 'build', NOW);

    expect(name).toHaveLength(63);
    expect(name.endsWith('-build-1772366400')).toBe(true);
  });

  it('does not leave a dangling separator after shortening', () => {
    // 46 characters survive the cut, the last of which is '-'.
    const name = jobNameFor(`${'b'.repeat(45)}-tail`, 'build', NOW);

    expect(name).toBe(`${'b'.repeat(45)}-build-1772366400`);
  });
});

describe('buildJobManifest', () => {
  it('creates a non-restarting single container job', () => {
    const job = buildJobManifest({
      template: staticSiteProfile.template,
      objectName: 'docs',
      jobName: 'docs-build-1772366400',
      env: [{ name: 'SITE_NAME', value: 'docs' }],
      config: testConfig(),
    });

    expect(job).toEqual({
      apiVersion: 'batch/v1',
      kind: 'Job',
      metadata: {
        name: 'docs-build-1772366400',
        namespace: 'static-hosting',
        labels: { app: 'static-site-builder', 'static-site': 'docs' },
      },
      spec: {
        backoffLimit: 3,
        activeDeadlineSeconds: 1800,
        template: {
          metadata: { labels: { app: 'static-site-builder', 'static-site': 'docs' } },
          spec: {
            restartPolicy: 'Never',
            containers: [{
              name: 'builder',
              image: 'builder:test',
              env: [{ name: 'SITE_NAME', value: 'docs' }],
              resources: {
                requests: { cpu: '500m', memory: '1Gi' },
                limits: { cpu: '2000m', memory: '4Gi' },
              },
            }],
          },
        },
      },
    });
  });

  it('sets a TTL only when configured', () => {
    const base = testConfig();
    const job = buildJobManifest({
      template: researchSessionProfile.template,
      objectName: 'survey',
      jobName: 'survey-run-1772366400',
      env: [],
      config: { ...base, job: { ...base.job, ttlSecondsAfterFinished: 600 } },
    });

    expect(job.spec?.ttlSecondsAfterFinished).toBe(600);
    expect(job.metadata?.labels).toEqual({ app: 'claude-runner', 'research-session': 'survey' });
  });
});

describe('staticSiteProfile.buildEnv', () => {
  function envFor(rawSpec: unknown): Record<string, string | undefined> {
    const decoded = decodeStaticSiteSpec(rawSpec);
    if (!decoded.ok) throw new Error(decoded.error);
    const vars = staticSiteProfile.buildEnv('docs', decoded.spec, testConfig());
    return envOf({ spec: { template: { spec: { containers: [{ name: 'builder', env: vars }] } } } });
  }

  it('passes docker sources through', () => {
    const env = envFor({
      source: { type: 'docker', docker: { image: 'registry.example.test/site:1', path: '/srv/www' } },
      build: { enabled: true, command: 'pnpm build', outputDir: 'out' },
      spa: true,
    });

    expect(env).toMatchObject({
      SOURCE_TYPE: 'docker',
      DOCKER_IMAGE: 'registry.example.test/site:1',
      DOCKER_PATH: '/srv/www',
      BUILD_ENABLED: 'true',
      BUILD_COMMAND: 'pnpm build',
      BUILD_OUTPUT_DIR: 'out',
      SPA_MODE: 'true',
    });
  });

  it('hands archive sources to the builder under its url variables', () => {
    const env = envFor({ source: { type: 'archive', archive: { url: 'https://files.example.test/s.zip' } } });

    expect(env.SOURCE_TYPE).toBe('url');
    expect(env.URL_ARCHIVE).toBe('https://files.example.test/s.zip');
    expect(env.URL_PATH).toBeUndefined();
    expect(env.GIT_REPOSITORY).toBeUndefined();
  });

  it('keeps legacy url manifests building', () => {
    const env = envFor({
      source: { type: 'url', url: { archive: 'https://files.example.test/a.zip', path: 'site' } },
    });

    expect(env).toMatchObject({
      SOURCE_TYPE: 'url',
      URL_ARCHIVE: 'https://files.example.test/a.zip',
      URL_PATH: 'site',
    });
  });

  it('passes git sources through', () => {
    const env = envFor({
      source: { type: 'git', git: { repository: 'https://git.example.test/docs.git', branch: 'main' } },
    });

    expect(env.SOURCE_TYPE).toBe('git');
    expect(env.GIT_REPOSITORY).toBe('https://git.example.test/docs.git');
    expect(env.GIT_BRANCH).toBe('main');
  });
});

describe('status helpers', () => {
  it('formats timestamps without fractional seconds', () => {
    expect(timestamp(new Date('2026-03-01T12:00:00.123Z'))).toBe('2026-03-01T12:00:00Z');
  });

  it('derives a DNS-safe site host', () => {
    expect(siteUrl('My_Docs', 'sites.example.test')).toBe('https://my-docs.sites.example.test');
  });

  it('writes the site URL on success', () => {
    expect(staticSiteProfile.succeededStatus('docs', NOW, testConfig())).toEqual({
      phase: 'Ready',
      message: 'Site built and deployed successfully',
      url: 'https://docs.sites.example.test',
      lastBuildTime: '2026-03-01T12:00:00Z',
    });
  });
});
