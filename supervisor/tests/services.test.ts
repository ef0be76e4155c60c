import path from 'path';
import { buildLaunchCommand, ORCHESTRATOR_SERVICE, REPO_ROOT, selectServices } from '../src/core/services';
import { findMissingEnvVars } from '../src/config';

describe('service definitions', () => {
  test('only the two worker agents run by default', () => {
    expect(selectServices(false).map((service) => service.name)).toEqual(['damage-assessor', 'payment-processor']);
  });

  test('the orchestrator is launched last when requested', () => {
    expect(selectServices(true).map((service) => service.name)).toEqual([
      'damage-assessor',
      'payment-processor',
      'orchestrator',
    ]);
  });

  test('launch command runs the entry under the current node binary', () => {
    expect(buildLaunchCommand(ORCHESTRATOR_SERVICE)).toEqual({
      command: process.execPath,
      args: ['-r', 'ts-node/register/transpile-only', path.join(REPO_ROOT, 'orchestrator/src/server.ts')],
    });
  });

  test('repository root holds every workspace', () => {
    expect(path.resolve(REPO_ROOT, 'supervisor', 'src', 'core')).toBe(path.resolve(__dirname, '..', 'src', 'core'));
  });
});

describe('required environment', () => {
  test('reports AGENT_SEED when it is missing or empty', () => {
    expect(findMissingEnvVars({})).toEqual(['AGENT_SEED']);
    expect(findMissingEnvVars({ AGENT_SEED: '' })).toEqual(['AGENT_SEED']);
  });

  test('passes when AGENT_SEED is set', () => {
    expect(findMissingEnvVars({ AGENT_SEED: 'test-seed' })).toEqual([]);
  });
});
