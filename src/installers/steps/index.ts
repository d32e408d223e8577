import type { InstallStep } from '../types';
import { CACHE_DIR_NAMES } from '../../config';
import { REPOSITORIES } from '../../shared-constants';
import { FetchRepositoryStep } from './fetch-repository-step';
import { ReshadeStep } from './reshade-step';
import { D3dCompilerStep } from './d3dcompiler-step';
import { LinkGposingwayStep } from './link-gposingway-step';
import { GposingwayConfigStep } from './gposingway-config-step';
import { ShaderPackagesStep } from './shader-packages-step';
import { WineConfigStep } from './wine-config-step';

export { FetchRepositoryStep } from './fetch-repository-step';
export { ReshadeStep, buildInstallerAnswers, buildInstallerEnv } from './reshade-step';
export { D3dCompilerStep } from './d3dcompiler-step';
export { LinkGposingwayStep } from './link-gposingway-step';
export { GposingwayConfigStep, buildMergePatches } from './gposingway-config-step';
export { ShaderPackagesStep } from './shader-packages-step';
export { WineConfigStep, buildWinePatches } from './wine-config-step';

export function createDefaultSteps(): InstallStep[] {
  return [
    new FetchRepositoryStep('fetch-reshade-installer', REPOSITORIES.RESHADE_INSTALLER, CACHE_DIR_NAMES.RESHADE_INSTALLER),
    new ReshadeStep(),
    new D3dCompilerStep(),
    new FetchRepositoryStep('fetch-gposingway', REPOSITORIES.GPOSINGWAY, CACHE_DIR_NAMES.GPOSINGWAY),
    new LinkGposingwayStep(),
    new GposingwayConfigStep(),
    new ShaderPackagesStep(),
    new WineConfigStep(),
  ];
}
