import type { DocRecord, FileRecord } from '../../parsers/java/types';
import { createComponentLogger } from '../../utils/logger';
import {
  GraphProperties,
  NodeLabel,
  NodeRow,
  RelationshipRow,
  RelationshipType,
  WriteStats,
} from '../models';
import { mergeStats, writeNodeRows, writeRelationshipRows } from './batch-utils';
import { WriteContext } from './types';

const logger = createComponentLogger('doc-service');

function docKey(file: string, doc: DocRecord): GraphProperties {
  return { file, start_line: doc.start_line, end_line: doc.end_line };
}

function hasDoc(from: GraphProperties, file: string, doc: DocRecord): RelationshipRow {
  return { from, to: docKey(file, doc), key: {}, props: {} };
}

/**
 * Doc nodes and their HAS_DOC owners. Type docs hang off both the type and its file.
 */
export async function writeDocs(
  context: WriteContext,
  files: readonly FileRecord[]
): Promise<WriteStats> {
  const docRows: NodeRow[] = [];
  const fileEdges: RelationshipRow[] = [];
  const classEdges: RelationshipRow[] = [];
  const interfaceEdges: RelationshipRow[] = [];
  const methodEdges: RelationshipRow[] = [];

  for (const file of files) {
    for (const doc of file.docs) {
      docRows.push({
        key: docKey(file.path, doc),
        props: { kind: doc.kind, scope: doc.scope, text: doc.text, owner: doc.owner },
      });

      switch (doc.scope) {
        case 'class':
          classEdges.push(hasDoc({ name: doc.owner, file: file.path }, file.path, doc));
          fileEdges.push(hasDoc({ path: file.path }, file.path, doc));
          break;
        case 'interface':
          interfaceEdges.push(hasDoc({ name: doc.owner, file: file.path }, file.path, doc));
          fileEdges.push(hasDoc({ path: file.path }, file.path, doc));
          break;
        case 'method':
          methodEdges.push(hasDoc({ method_signature: doc.owner }, file.path, doc));
          break;
      }
    }
  }

  const nodes = await writeNodeRows(context, NodeLabel.DOC, docRows);

  const owners: Array<[NodeLabel, RelationshipRow[]]> = [
    [NodeLabel.FILE, fileEdges],
    [NodeLabel.CLASS, classEdges],
    [NodeLabel.INTERFACE, interfaceEdges],
    [NodeLabel.METHOD, methodEdges],
  ];
  const edges: WriteStats[] = [];
  for (const [fromLabel, rows] of owners) {
    edges.push(
      await writeRelationshipRows(
        context,
        { type: RelationshipType.HAS_DOC, fromLabel, toLabel: NodeLabel.DOC, mergeKeys: [] },
        rows
      )
    );
  }

  logger.debug('Docs written', { docs: docRows.length });
  return mergeStats(nodes, ...edges);
}
