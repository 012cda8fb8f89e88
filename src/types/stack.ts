export interface Stack {
  key: string;
  name: string;
  directory: string;
  files: string[];
  environment: Record<string, string>;
  dependsOn: string[];
}

export interface StackDefinition {
  key: string;
  name?: string | null;
  directory?: string | null;
  files?: string[] | null;
  environment?: Record<string, string> | null;
  dependsOn?: string[] | null;
}

/**
 * Read-only view of every configured stack, with the dependency edges kept
 * as an adjacency map keyed by stack identity.
 */
export interface StackGraph {
  readonly stacks: ReadonlyMap<string, Stack>;
  readonly dependencies: ReadonlyMap<string, readonly string[]>;
}

export interface ToolCommand {
  program: string;
  args: string[];
}

export interface StacksConfig {
  filePath: string;
  baseDir: string;
  tool: ToolCommand;
  graph: StackGraph;
}
