/**
 * Shared identifiers used by the resolver, the installation steps and the CLI
 * NEVER duplicate these strings - always import from here
 */

// Steam app id of FINAL FANTASY XIV Online
export const FFXIV_STEAM_APP_ID = 39210;

// Default Steam install directory name (overridden by the app manifest's installdir)
export const FFXIV_STEAM_INSTALL_DIR = 'FINAL FANTASY XIV Online';

// Manual override variables - both must be set to skip auto-detection
export const FFXIV_PATH_ENV = 'FFXIV_PATH';
export const WINE_PREFIX_ENV = 'WINE_PREFIX';

export const WORKDIR_ENV = 'FFXIV_RESHADE_WORKDIR';
export const APP_DIR_NAME = 'ffxiv-reshade-setup';

export const REPOSITORIES = {
  RESHADE_INSTALLER: 'https://github.com/kevinlekiller/reshade-steam-proton.git',
  GPOSINGWAY: 'https://github.com/gposingway/gposingway.git',
} as const;

// GPosingway needs addon support, which 6.5.1 provides
export const RESHADE_VERSION = '6.5.1';

export interface ShaderPackage {
  name: string;
  url: string;
}

export const SHADER_PACKAGES: readonly ShaderPackage[] = [
  { name: 'iMMERSE', url: 'https://github.com/martymcmodding/iMMERSE/archive/refs/heads/master.zip' },
  { name: 'METEOR', url: 'https://github.com/martymcmodding/METEOR/archive/refs/heads/master.zip' },
];

export const GPOSINGWAY_CONFIG_FILES = ['ReShade.ini', 'ReShadePreset.ini'] as const;
export const GPOSINGWAY_LINKED_DIRS = ['reshade-presets', 'reshade-shaders'] as const;

// Baseline shader directory the ReShade installer drops into the game folder
export const BASELINE_SHADERS_DIR = 'ReShade_shaders';

export const D3DCOMPILER_DLLS = ['d3dcompiler_47.dll', 'd3dcompiler_43.dll'] as const;

// Stub DLLs are tiny; the real Microsoft d3dcompiler is several MB
export const MIN_REAL_DLL_SIZE = 1_000_000;

// Shift+F2 (F2=113, Shift modifier=1)
export const RESHADE_OVERLAY_KEY = '113,0,1,0';

export const DLL_OVERRIDES = {
  FULL: 'd3dcompiler_43=n,b;d3dcompiler_47=n,b;dxgi=n,b',
  COMPILER_ONLY: 'd3dcompiler_43=n,b;d3dcompiler_47=n,b',
} as const;
