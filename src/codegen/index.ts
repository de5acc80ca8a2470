export { CodeGenerator, CodegenOptions, DEFAULT_CODEGEN_OPTIONS, GeneratedFile, generateFiles } from './generator';
export { MessageCodecGenerator } from './messageCodec';
export { ServiceStubGenerator, ServiceStubOptions } from './serviceStubs';
export { FileNames, outputPathFor, relativeModuleSpecifier, methodPropertyName } from './naming';
