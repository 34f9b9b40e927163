export type GrammarKey = 'python' | 'javascript' | 'typescript' | 'tsx' | 'java';

export interface LanguageRule {
  lang: GrammarKey;
  /** Root-level node types that open a declaration span */
  nodeTypes: readonly string[];
}

const PYTHON_NODES = [
  'function_definition',
  'class_definition',
  'decorated_definition'
] as const;

const JAVASCRIPT_NODES = [
  'function_declaration',
  'generator_function_declaration',
  'class_declaration',
  'export_statement',
  'lexical_declaration',
  'variable_declaration'
] as const;

const TYPESCRIPT_NODES = [
  ...JAVASCRIPT_NODES,
  'abstract_class_declaration',
  'interface_declaration',
  'type_alias_declaration',
  'enum_declaration',
  'ambient_declaration'
] as const;

const JAVA_NODES = [
  'class_declaration',
  'interface_declaration',
  'enum_declaration',
  'record_declaration',
  'annotation_type_declaration'
] as const;

/**
 * Extensions parsed with tree-sitter when the grammar loads
 */
export const LANG_RULES: Readonly<Record<string, LanguageRule>> = {
  '.py': { lang: 'python', nodeTypes: PYTHON_NODES },
  '.js': { lang: 'javascript', nodeTypes: JAVASCRIPT_NODES },
  '.jsx': { lang: 'javascript', nodeTypes: JAVASCRIPT_NODES },
  '.mjs': { lang: 'javascript', nodeTypes: JAVASCRIPT_NODES },
  '.cjs': { lang: 'javascript', nodeTypes: JAVASCRIPT_NODES },
  '.ts': { lang: 'typescript', nodeTypes: TYPESCRIPT_NODES },
  '.mts': { lang: 'typescript', nodeTypes: TYPESCRIPT_NODES },
  '.cts': { lang: 'typescript', nodeTypes: TYPESCRIPT_NODES },
  '.tsx': { lang: 'tsx', nodeTypes: TYPESCRIPT_NODES },
  '.java': { lang: 'java', nodeTypes: JAVA_NODES }
};

/**
 * Nodes that wrap the declaration carrying the name
 */
export const WRAPPER_NODE_TYPES: ReadonlySet<string> = new Set([
  'export_statement',
  'decorated_definition',
  'lexical_declaration',
  'variable_declaration',
  'ambient_declaration'
]);

/**
 * Child node types that hold a declaration's name
 */
export const NAME_NODE_TYPES: ReadonlySet<string> = new Set([
  'identifier',
  'type_identifier',
  'property_identifier',
  'dotted_name'
]);
