/**
 * Schema of the bridgegen.yaml configuration file.
 *
 * Identifier styles are written as examples of the canonical token
 * `foo_bar` (`FooBar`, `mFooBar`, `FOO_BAR`, ...) and resolved by style
 * inference when the configuration model is built.
 */
import { z } from 'zod';

/**
 * Drop null-valued keys so an empty YAML section (`cpp:`) reads as a
 * missing one and takes its defaults.
 */
function dropNulls(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value)
      .filter(([, v]) => v !== null)
      .map(([k, v]) => [k, dropNulls(v)])
  );
}

const Example = z.string().min(1);

const CppIdentStyleSchema = z.object({
  ty: Example.optional(),
  enum_type: Example.optional(),
  type_param: Example.optional(),
  method: Example.optional(),
  field: Example.optional(),
  local: Example.optional(),
  enum: Example.optional(),
  const: Example.optional(),
}).strict();

const JavaIdentStyleSchema = z.object({
  ty: Example.optional(),
  type_param: Example.optional(),
  method: Example.optional(),
  field: Example.optional(),
  local: Example.optional(),
  enum: Example.optional(),
  const: Example.optional(),
}).strict();

const PythonIdentStyleSchema = JavaIdentStyleSchema.extend({
  class_name: Example.optional(),
}).strict();

const CppCliIdentStyleSchema = JavaIdentStyleSchema.extend({
  property: Example.optional(),
  file: Example.optional(),
}).strict();

/** C++ output settings. */
export const CppSectionSchema = z.object({
  out_folder: z.string().optional(),
  header_out_folder: z.string().optional(),
  include_prefix: z.string().default(''),
  namespace: z.string().default(''),
  ident_style: CppIdentStyleSchema.prefault({}),
  file_ident_style: Example.default('foo_bar'),
  header_ext: z.string().default('hpp'),
  optional_template: z.string().default('std::optional'),
  optional_header: z.string().default('<optional>'),
  enum_hash_workaround: z.boolean().default(true),
});

/** Java output settings. */
export const JavaSectionSchema = z.object({
  out_folder: z.string().optional(),
  package: z.string().optional(),
  ident_style: JavaIdentStyleSchema.prefault({}),
});

/** JNI output settings. */
export const JniSectionSchema = z.object({
  out_folder: z.string().optional(),
  header_out_folder: z.string().optional(),
  include_prefix: z.string().default(''),
  include_cpp_prefix: z.string().default(''),
  namespace: z.string().default('bridgegen_generated'),
  class_ident_style: Example.default('NativeFooBar'),
  file_ident_style: Example.default('NativeFooBar'),
});

/** Objective-C output settings. */
export const ObjcSectionSchema = z.object({
  out_folder: z.string().optional(),
  header_out_folder: z.string().optional(),
  ident_style: JavaIdentStyleSchema.prefault({}),
  file_ident_style: Example.default('FooBar'),
  include_prefix: z.string().default(''),
  header_ext: z.string().default('h'),
  swift_bridging_header_name: z.string().min(1).optional(),
  closed_enums: z.boolean().default(false),
});

/** Objective-C++ output settings. */
export const ObjcppSectionSchema = z.object({
  out_folder: z.string().optional(),
  header_out_folder: z.string().optional(),
  ext: z.string().default('mm'),
  include_prefix: z.string().default(''),
  include_cpp_prefix: z.string().default(''),
  include_objc_prefix: z.string().default(''),
  namespace: z.string().default('bridgegen_generated'),
});

/** C++/CLI output settings. */
export const CppCliSectionSchema = z.object({
  out_folder: z.string().optional(),
  ident_style: CppCliIdentStyleSchema.prefault({}),
  namespace: z.string().default(''),
  include_cpp_prefix: z.string().default(''),
});

/** YAML output settings. */
export const YamlSectionSchema = z.object({
  out_folder: z.string().optional(),
  out_file: z.string().min(1).optional(),
  prefix: z.string().default(''),
});

/** Python output settings. */
export const PythonSectionSchema = z.object({
  out_folder: z.string().optional(),
  ident_style: PythonIdentStyleSchema.prefault({}),
  import_prefix: z.string().default(''),
});

/** C wrapper output settings. */
export const CWrapperSectionSchema = z.object({
  out_folder: z.string().optional(),
  header_out_folder: z.string().optional(),
  include_prefix: z.string().default(''),
  include_cpp_prefix: z.string().default(''),
});

/** Python CFFI wrapper output settings. */
export const CffiSectionSchema = z.object({
  out_folder: z.string().optional(),
  package_name: z.string().default(''),
  dynamic_lib_list: z.string().default(''),
});

const ConfigObjectSchema = z.object({
  idl_file_name: z.string().default(''),
  skip_generation: z.boolean().default(false),
  /** File receiving one output path per line as files are claimed. */
  list_out_files: z.string().optional(),
  cpp: CppSectionSchema.prefault({}),
  java: JavaSectionSchema.prefault({}),
  jni: JniSectionSchema.prefault({}),
  objc: ObjcSectionSchema.prefault({}),
  objcpp: ObjcppSectionSchema.prefault({}),
  cpp_cli: CppCliSectionSchema.prefault({}),
  yaml: YamlSectionSchema.prefault({}),
  python: PythonSectionSchema.prefault({}),
  c_wrapper: CWrapperSectionSchema.prefault({}),
  cffi: CffiSectionSchema.prefault({}),
});

/** Complete configuration file. */
export const ConfigSchema = z.preprocess(dropNulls, ConfigObjectSchema);

export type ConfigInput = z.infer<typeof ConfigSchema>;
/** Configuration as written; every section and setting may be left out. */
export type ConfigFileInput = z.input<typeof ConfigObjectSchema>;
