export enum ToolchainKind {
  Embedded = 'embedded',
  System = 'system',
}

/**
 * A resolved compiler. Embedded toolchains carry their own sysroot; the system
 * compiler uses whatever sysroot it was installed with.
 */
export type ToolchainHandle =
  | { kind: ToolchainKind.Embedded; compilerPath: string; sysroot: string }
  | { kind: ToolchainKind.System; compilerPath: string };

export function toolchainSysroot(handle: ToolchainHandle): string | undefined {
  return handle.kind === ToolchainKind.Embedded ? handle.sysroot : undefined;
}
