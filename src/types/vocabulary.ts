// =============================================================================
// PATHGUARD — Tag Vocabulary Types
//
// The naming convention that turns folder names into permission attributes.
// Raw* types describe the JSON file; TagVocabulary is the validated,
// normalized and frozen value handed to the deriver and the admin service.
// =============================================================================

/** One hierarchy family: every token in it maps to the same rank */
export interface RawHierarchyFamily {
  rank: number;
  tokens: string[];
}

/**
 * A role-indicating folder name.
 * `rankSubstitute` is the rank at which a user satisfies the role without an
 * explicit contextual grant; null means only an explicit grant counts.
 */
export interface RawRoleDefinition {
  folder: string;
  role: string;
  rankSubstitute: number | null;
}

/** Shape of config/vocabulary.json */
export interface RawVocabulary {
  departments: string[];
  hierarchy: RawHierarchyFamily[];
  roles: RawRoleDefinition[];
  projectRoots: string[];
  defaultDepartment: string;
  defaultRole: string;
  defaultHierarchyLevel: number;
  adminRank: number;
}

export interface RoleDefinition {
  role: string;
  rankSubstitute: number | null;
}

export interface TagVocabulary {
  /** Normalized department tags */
  readonly departments: ReadonlySet<string>;
  /** Normalized hierarchy token → rank */
  readonly hierarchyTokens: ReadonlyMap<string, number>;
  /** Normalized role folder name → role definition */
  readonly roleFolders: ReadonlyMap<string, RoleDefinition>;
  /** Normalized folder names whose children are project folders */
  readonly projectRoots: ReadonlySet<string>;
  readonly defaultDepartment: string;
  readonly defaultRole: string;
  readonly defaultHierarchyLevel: number;
  /** Highest rank; a user at this rank holds the admin override */
  readonly adminRank: number;
  readonly maxRank: number;
}
