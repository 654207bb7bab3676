import yaml from 'js-yaml'
import { toPlain } from '../storage/mapping-utils.js'
import type { ConfigMap } from '../storage/types.js'
import { FileDocument } from './file-document.js'

/**
 * YAML-backed document. Uses the core schema so that timestamps and other
 * tagged scalars stay plain strings.
 */
export class YamlDocument extends FileDocument {
  protected readonly format = 'YAML'

  constructor(documentPath: string, autowrite = true) {
    super(documentPath, autowrite)
    this.read()
  }

  protected parse(raw: string): unknown {
    return yaml.load(raw, { schema: yaml.CORE_SCHEMA })
  }

  protected serialize(entries: ConfigMap): string {
    return yaml.dump(toPlain(entries), { schema: yaml.CORE_SCHEMA, noRefs: true })
  }
}
