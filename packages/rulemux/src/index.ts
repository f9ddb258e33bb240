/**
 * rulemux -- translate AI coding-assistant rules between dialects and keep
 * them in a git-backed store.
 *
 * Primary API:
 *   getDialect()     -> DialectAdapter     Read/render/write one dialect
 *   convertRules()   -> ConvertResult      Dialect to dialect, no store
 *   pushRules()      -> PushResult         Dialect into the store
 *   pullRules()      -> PullResult         Store into a dialect
 *   syncStore()      -> SyncResult         Store with its remote (the only merge)
 *
 * Store:
 *   initStore() / openStore()  -> Store
 *   GitVersionControl          simple-git backed VersionControl
 *
 * Backup/restore:
 *   createBackup()  -> string | undefined
 *   listBackups()   -> BackupInfo[]
 *   restoreBackup() -> RestoreResult
 *   deleteBackup()  -> void
 */

// ============================================================
// Rule model
// ============================================================

export type { Activation, DialectId, Rule, RuleSet, Scope, StoredRule } from "./types/rule"
export { ACTIVATIONS, DIALECT_IDS, SCOPES, STORE_VERSION, USER_PROJECT } from "./types/rule"
export { contentHash, deriveRuleId, filenameStem, rulesEquivalent } from "./ir/identity"
export type { ValidationResult } from "./ir/validate"
export {
	assertValidRule,
	isActivation,
	isScope,
	parseActivation,
	parseScope,
	validateRule,
} from "./ir/validate"

// ============================================================
// Errors
// ============================================================

export {
	ConfigError,
	InvalidRuleError,
	LockContentionError,
	MalformedMetadataError,
	ProjectExistsError,
	ProjectNotFoundError,
	ReservedProjectError,
	RulemuxError,
	StoreNotFoundError,
	UnknownFormatError,
	UnreadableSourceError,
	WriteError,
} from "./errors"

// ============================================================
// Dialects
// ============================================================

export type { ActivationSupport, DialectCapabilities } from "./dialects/capabilities"
export {
	DIALECT_CAPABILITIES,
	describeLosses,
	supportedActivations,
	survivingScopes,
} from "./dialects/capabilities"
export { getDialect, listDialects, parseDialectId } from "./dialects"
export type { DialectAdapter, ReadOptions, RenderedFile, RenderResult } from "./dialects/types"
export type { FileChange, FileStatus, WriteOptions, WriteResult } from "./writer"

// ============================================================
// Orchestrator
// ============================================================

export type {
	ConvertOptions,
	ConvertResult,
	PullOptions,
	PullResult,
	PushOptions,
	PushResult,
	ReadSourcesResult,
	SourceReadFailure,
	SourceReadResult,
	SourceSpec,
} from "./orchestrator"
export { convertRules, pullRules, pushRules, readSources, scanAll } from "./orchestrator"

// ============================================================
// Store, merge, sync
// ============================================================

export type { PutOptions, PutResult, PutStatus, RuleFilter, StoreOptions } from "./store"
export { initStore, openStore, Store } from "./store"
export type { GitRemote, GitVersionControlOptions } from "./store/git"
export { GitVersionControl } from "./store/git"
export type { Divergence, VersionControl } from "./store/vcs"
export type { MergeInput, MergeResult, MergeWarning, MergeWarningKind, Snapshot } from "./merge"
export { mergeSnapshots } from "./merge"
export type { SyncOptions, SyncResult, SyncStatus } from "./sync"
export { syncStore } from "./sync"

// ============================================================
// Config, discovery, backups
// ============================================================

export type { LoadConfigOptions, RemoteConfig, RulemuxConfig } from "./config"
export { loadConfig, saveConfig } from "./config"
export type { DiscoverOptions, UserLocation, UserLocationKind } from "./discover"
export { discoverUserLocations } from "./discover"
export type { BackupInfo, BackupSummary, RestoreResult } from "./backup"
export { createBackup, deleteBackup, listBackups, restoreBackup, summarizeBackup } from "./backup"

// ============================================================
// Utilities
// ============================================================

export type { Logger } from "./utils/logger"
export { createLogger, silentLogger } from "./utils/logger"
export { expandTilde, rulemuxHome, tildify } from "./utils/paths"
export { RULEMUX_VERSION } from "./version"
