import { z } from "zod";

export const TimestampSchema = z.string().datetime();
export const CommitSchema = z.string().regex(/^[a-f0-9]{64}$/);
export const InstallationIdSchema = z.string().regex(/^[A-Za-z0-9_][A-Za-z0-9_.-]*$/);
export const RemoteNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9_][A-Za-z0-9_.-]*$/)
  .refine((name) => name !== "__proto__", { message: "Reserved remote name" });

const RESERVED_INSTALLATION_IDS = new Set(["default", "user"]);

export const InstallationConfigSchema = z.object({
  id: InstallationIdSchema.refine((id) => !RESERVED_INSTALLATION_IDS.has(id), {
    message: "Installation ids 'default' and 'user' are reserved"
  }),
  path: z.string().min(1),
  displayName: z.string().min(1).optional()
});

export const ConfigFileSchema = z.object({
  systemDir: z.string().min(1).optional(),
  userDir: z.string().min(1).optional(),
  installations: z.array(InstallationConfigSchema).default([]),
  journalPath: z.string().min(1).optional(),
  arch: z.string().min(1).optional(),
  glDrivers: z.array(z.string().min(1)).optional(),
  passwdPath: z.string().min(1).optional()
});

export const RemoteConfigSchema = z.object({
  url: z.string().min(1),
  title: z.string().min(1).optional()
});

export const InstalledRefSchema = z.object({
  remote: RemoteNameSchema,
  commit: CommitSchema,
  installed_at: TimestampSchema
});

export const InstallationStateSchema = z.object({
  version: z.literal(1),
  remotes: z.record(RemoteNameSchema, RemoteConfigSchema).default({}),
  installed: z.record(z.string().min(1), InstalledRefSchema).default({})
});

export const RemoteRefSchema = z.object({
  commit: CommitSchema,
  installed_size: z.number().int().nonnegative().optional(),
  download_size: z.number().int().nonnegative().optional()
});

export const RemoteSummarySchema = z.object({
  title: z.string().min(1).optional(),
  refs: z.record(z.string().min(1), RemoteRefSchema)
});

// Journal lines are flat records of string fields, keyed the way the writer names them.
export const JournalEntrySchema = z.record(z.string(), z.string());

export const RefKindSchema = z.enum(["app", "runtime"]);

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type InstallationConfig = z.infer<typeof InstallationConfigSchema>;
export type RemoteConfig = z.infer<typeof RemoteConfigSchema>;
export type InstalledRef = z.infer<typeof InstalledRefSchema>;
export type InstallationState = z.infer<typeof InstallationStateSchema>;
export type RemoteRef = z.infer<typeof RemoteRefSchema>;
export type RemoteSummary = z.infer<typeof RemoteSummarySchema>;
export type JournalEntry = z.infer<typeof JournalEntrySchema>;
export type RefKind = z.infer<typeof RefKindSchema>;

export interface DecomposedRef {
  kind: RefKind;
  id: string;
  arch: string;
  branch: string;
}

const ID_ELEMENT_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const LAST_ID_ELEMENT_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;
const BRANCH_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;
const ARCH_PATTERN = /^[A-Za-z0-9_]+$/;
const MAX_ID_LENGTH = 255;

export function isValidAppId(id: string): boolean {
  if (id.length === 0 || id.length > MAX_ID_LENGTH) {
    return false;
  }

  const elements = id.split(".");
  if (elements.length < 3) {
    return false;
  }

  return elements.every((element, index) =>
    index === elements.length - 1
      ? LAST_ID_ELEMENT_PATTERN.test(element)
      : ID_ELEMENT_PATTERN.test(element)
  );
}

export function isValidBranch(branch: string): boolean {
  return BRANCH_PATTERN.test(branch);
}

export function decomposeRef(ref: string): DecomposedRef | null {
  const parts = ref.split("/");
  if (parts.length !== 4) {
    return null;
  }

  const [kind, id, arch, branch] = parts;
  const parsedKind = RefKindSchema.safeParse(kind);
  if (!parsedKind.success) {
    return null;
  }
  if (!id || !isValidAppId(id)) {
    return null;
  }
  if (!arch || !ARCH_PATTERN.test(arch)) {
    return null;
  }
  if (!branch || !isValidBranch(branch)) {
    return null;
  }

  return { kind: parsedKind.data, id, arch, branch };
}

export function composeRef(ref: DecomposedRef): string {
  return `${ref.kind}/${ref.id}/${ref.arch}/${ref.branch}`;
}

export function emptyInstallationState(): InstallationState {
  return { version: 1, remotes: {}, installed: {} };
}
