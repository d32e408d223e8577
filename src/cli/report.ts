import type { InstallationTarget, LauncherKind, RunReport, StepOutcome } from '../types';
import { DLL_OVERRIDES } from '../shared-constants';

const RULE = '='.repeat(80);

const LAUNCHER_LABELS: Record<LauncherKind, string> = {
  steam: 'Steam',
  xlcore: 'XLCore',
  manual: 'environment variables',
};

export function describeTarget(target: InstallationTarget): string[] {
  const lines = [
    `Found FFXIV via ${LAUNCHER_LABELS[target.launcher]}`,
    `\tGame location:\t${target.gamePath}`,
    `\tWine prefix:\t${target.prefixPath}`,
  ];
  if (target.protonPrefixPath) {
    lines.push(`\tProton prefix:\t${target.protonPrefixPath}`);
  }
  return lines;
}

export function formatOutcome(outcome: StepOutcome): string {
  switch (outcome.status) {
    case 'completed':
      return `✓ ${outcome.step}`;
    case 'skipped':
      return `⏭️  ${outcome.step} (already done)`;
    case 'failed':
      return `❌ ${outcome.step}: [${outcome.failure.kind}] ${outcome.failure.message}`;
  }
}

export function formatRunSummary(report: RunReport): string[] {
  const lines = ['', 'Summary:', ...report.outcomes.map(outcome => `  ${formatOutcome(outcome)}`)];

  const copied = report.backups.filter(record => record.kind === 'copied').length;
  if (copied > 0) {
    lines.push(`  ${copied} file(s) backed up; restore them with --restore`);
  }
  if (report.halted) {
    lines.push('', 'Installation stopped. Fix the problem above and run again to resume.');
  }
  return lines;
}

/**
 * What the user still has to set in their launcher so Wine loads the
 * native DLLs instead of its builtins
 */
export function formatPostInstallInstructions(launcher: LauncherKind): string[] {
  const overrides: Record<LauncherKind, string[]> = {
    steam: ['   For Steam, set the following launch options:', `   WINEDLLOVERRIDES="${DLL_OVERRIDES.FULL}" %command%`],
    xlcore: [
      '   For XIVLauncher-rb/XLCore, go to the Wine tab and set Extra WINEDLLOVERRIDES to:',
      `   ${DLL_OVERRIDES.COMPILER_ONLY}`,
      '',
      "   NOTE: with 'Managed Proton', pick a GE-Proton version (not Wine-XIV-Staging)",
    ],
    manual: ['   Set the following environment variable when launching FFXIV:', `   WINEDLLOVERRIDES="${DLL_OVERRIDES.FULL}"`],
  };

  return [
    RULE,
    'IMPORTANT SETUP INSTRUCTIONS:',
    RULE,
    '',
    '1. Set WINEDLLOVERRIDES for shader compilation to work:',
    ...overrides[launcher],
    '',
    '2. Using GPosingway:',
    '   - Press Shift+F2 in-game to open the ReShade menu',
    '   - Select a preset from the dropdown at the top',
    '   - Some shaders may show compile errors with this ReShade version; core presets work',
    '',
    RULE,
  ];
}
