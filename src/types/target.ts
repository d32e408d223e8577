export type LauncherKind = 'steam' | 'xlcore' | 'manual';

export interface InstallationTarget {
  readonly launcher: LauncherKind;
  readonly gamePath: string;
  readonly prefixPath: string;
  // XLCore keeps a separate prefix for "Managed Proton"
  readonly protonPrefixPath?: string;
}

export interface KnownInstall {
  id: number;
  libraryPath: string;
  installDir?: string;
}
