/**
 * Per-file emitter
 * Writes one TypeScript module per schema file through ts-morph
 */

import { IndentationText, Project, QuoteKind } from 'ts-morph';
import { ResolvedFile } from '../core/graph';
import { SchemaModel } from '../core/fieldModel';
import { DEFAULT_CONFIG, GENERATED_HEADER } from '../utils/constants';
import { logger } from '../utils/logger';
import { MessageCodecGenerator } from './messageCodec';
import { FileNames, outputPathFor, relativeModuleSpecifier, RUNTIME_ALIAS } from './naming';
import { ServiceStubGenerator } from './serviceStubs';

export interface CodegenOptions {
  /** Emit `<Service>Client` classes */
  buildClient: boolean;
  /** Emit `<Service>Server` interfaces and `bind<Service>Server` */
  buildServer: boolean;
  /** Module specifier the generated code imports the wire runtime from */
  runtimeModule: string;
}

export const DEFAULT_CODEGEN_OPTIONS: CodegenOptions = {
  buildClient: true,
  buildServer: false,
  runtimeModule: DEFAULT_CONFIG.RUNTIME_MODULE
};

export interface GeneratedFile {
  /** URI of the schema the file was generated from */
  sourceUri: string;
  /** Import name of that schema, e.g. `a/b.proto` */
  importName: string;
  /** Output path relative to the output directory, e.g. `a/b.ts` */
  outputPath: string;
  content: string;
}

export class CodeGenerator {
  private readonly project = new Project({
    useInMemoryFileSystem: true,
    manipulationSettings: {
      indentationText: IndentationText.TwoSpaces,
      quoteKind: QuoteKind.Single
    }
  });

  constructor(
    private readonly schema: SchemaModel,
    private readonly options: CodegenOptions = DEFAULT_CODEGEN_OPTIONS
  ) {}

  generateFile(file: ResolvedFile): GeneratedFile {
    const graph = this.schema.graph;
    const outputPath = outputPathFor(file.importName);
    const sourceFile = this.project.createSourceFile(outputPath, '', { overwrite: true });
    const names = new FileNames(graph, file);
    const declarations = graph.declarationsIn(file.uri);

    const needsRuntime = declarations.some(decl => decl.kind !== 'enum');
    if (needsRuntime) {
      sourceFile.addImportDeclaration({ namespaceImport: RUNTIME_ALIAS, moduleSpecifier: this.options.runtimeModule });
    }
    for (const dependencyUri of file.dependencies) {
      const dependency = graph.file(dependencyUri);
      if (!dependency) {
        continue;
      }
      sourceFile.addImportDeclaration({
        namespaceImport: names.importAlias(dependencyUri),
        moduleSpecifier: relativeModuleSpecifier(file.importName, dependency.importName)
      });
    }

    const messages = new MessageCodecGenerator(names);
    for (const decl of declarations) {
      if (decl.kind === 'enum') {
        messages.emitEnum(sourceFile, this.schema.enum(decl.index));
      } else if (decl.kind === 'message') {
        messages.emitMessage(sourceFile, this.schema.message(decl.index));
      }
    }

    // Services reference codecs, which must be initialised first
    const services = new ServiceStubGenerator(names, this.options);
    for (const decl of declarations) {
      if (decl.kind === 'service') {
        services.emitService(sourceFile, decl);
      }
    }

    const header = `${GENERATED_HEADER[0]}\n${GENERATED_HEADER[1]}${file.importName}\n\n`;
    const content = header + sourceFile.getFullText();
    this.project.removeSourceFile(sourceFile);

    logger.debug(`Generated ${outputPath} (${declarations.length} declaration(s))`);
    return { sourceUri: file.uri, importName: file.importName, outputPath, content };
  }
}

/**
 * Generate every file of the graph, in the graph's file order
 */
export function generateFiles(schema: SchemaModel, options: CodegenOptions = DEFAULT_CODEGEN_OPTIONS): GeneratedFile[] {
  const generator = new CodeGenerator(schema, options);
  return schema.graph.files.map(file => generator.generateFile(file));
}
