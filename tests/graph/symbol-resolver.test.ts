import { describe, expect, it } from '@jest/globals';
import { NodeLabel, RelationshipType } from '../../src/database/models';
import { SymbolResolver } from '../../src/graph/symbol-resolver';
import { CallKind, ImportType } from '../../src/parsers/java/types';
import {
  call,
  makeClass,
  makeFile,
  makeImport,
  makeInterface,
  makeMethod,
  makeParameter,
} from '../helpers/record-factory';

describe('SymbolResolver', () => {
  describe('type references', () => {
    const files = [
      makeFile('p1/Z.java', { packageName: 'p1', classes: [makeClass('Z', 'p1/Z.java', { package: 'p1' })] }),
      makeFile('p2/Z.java', { packageName: 'p2', classes: [makeClass('Z', 'p2/Z.java', { package: 'p2' })] }),
      makeFile('shapes/Shape.java', {
        packageName: 'shapes',
        interfaces: [makeInterface('Shape', 'shapes/Shape.java', { package: 'shapes' })],
      }),
    ];
    const resolver = new SymbolResolver(files);

    it('refuses an ambiguous simple name', () => {
      expect(resolver.resolveType('Z')).toBeUndefined();
    });

    it('disambiguates through a package hint or qualification', () => {
      expect(resolver.resolveType('Z', 'p1')).toEqual({
        label: NodeLabel.CLASS,
        name: 'Z',
        file: 'p1/Z.java',
      });
      expect(resolver.resolveType('p2.Z')).toEqual({
        label: NodeLabel.CLASS,
        name: 'Z',
        file: 'p2/Z.java',
      });
    });

    it('falls back to the simple name when the hint matches nothing', () => {
      expect(resolver.resolveType('Shape', 'elsewhere')).toEqual({
        label: NodeLabel.INTERFACE,
        name: 'Shape',
        file: 'shapes/Shape.java',
      });
    });

    it('filters by label', () => {
      expect(resolver.resolveType('Shape', undefined, [NodeLabel.CLASS])).toBeUndefined();
    });

    it('ignores generics and arrays', () => {
      expect(resolver.resolveType('Shape[]')?.name).toBe('Shape');
      expect(resolver.resolveType('Shape<String>')?.name).toBe('Shape');
    });

    it('resolves names through the file imports', () => {
      const user = makeFile('app/User.java', {
        packageName: 'app',
        imports: [makeImport('p2.Z', ImportType.INTERNAL)],
      });
      const withImports = new SymbolResolver([...files, user]);

      expect(withImports.resolveTypeInFile('Z', 'app/User.java')?.file).toBe('p2/Z.java');
    });
  });

  describe('resolveAll', () => {
    const base = makeFile('core/Base.java', {
      packageName: 'core',
      classes: [makeClass('Base', 'core/Base.java', { package: 'core', implements: ['Closeable'] })],
      interfaces: [makeInterface('Closeable', 'core/Base.java', { package: 'core' })],
      methods: [makeMethod({ name: 'close', className: 'Base', file: 'core/Base.java', packageName: 'core' })],
    });

    const util = makeFile('core/Util.java', {
      packageName: 'core',
      classes: [makeClass('Util', 'core/Util.java', { package: 'core' })],
      methods: [
        makeMethod({
          name: 'format',
          className: 'Util',
          file: 'core/Util.java',
          packageName: 'core',
          isStatic: true,
          returnType: 'String',
        }),
        makeMethod({ name: 'reset', className: 'Util', file: 'core/Util.java', packageName: 'core' }),
      ],
    });

    const a = makeFile('app/A.java', {
      packageName: 'app',
      classes: [makeClass('A', 'app/A.java', { package: 'app', extends: 'Base' })],
      methods: [
        makeMethod({
          name: 'a',
          className: 'A',
          file: 'app/A.java',
          packageName: 'app',
          parameters: [makeParameter('base', 'Base', 0), makeParameter('count', 'int', 1)],
          calls: [
            call('b', CallKind.SAME_CLASS, 'A'),
            call('close', CallKind.SUPER, 'super', 'super'),
            call('format', CallKind.STATIC, 'Util', 'Util'),
            call('reset', CallKind.STATIC, 'Util', 'Util'),
            call('close', CallKind.INSTANCE, 'resource', 'resource'),
            call('missing', CallKind.SAME_CLASS, 'A'),
            call('Base', CallKind.CONSTRUCTOR, 'Base'),
            call('Closeable', CallKind.CONSTRUCTOR, 'Closeable'),
          ],
        }),
        makeMethod({ name: 'b', className: 'A', file: 'app/A.java', packageName: 'app' }),
        makeMethod({
          name: 'c',
          className: 'A',
          file: 'app/A.java',
          packageName: 'app',
          calls: [call('b', CallKind.THIS, 'A', 'this'), call('format', CallKind.INSTANCE, 'fmt', 'fmt')],
        }),
      ],
    });

    const edges = new SymbolResolver([base, util, a]).resolveAll();

    it('resolves inheritance edges with the right labels', () => {
      expect(edges.inheritance).toEqual([
        {
          type: RelationshipType.IMPLEMENTS,
          from: { label: NodeLabel.CLASS, name: 'Base', file: 'core/Base.java' },
          to: { label: NodeLabel.INTERFACE, name: 'Closeable', file: 'core/Base.java' },
        },
        {
          type: RelationshipType.EXTENDS,
          from: { label: NodeLabel.CLASS, name: 'A', file: 'app/A.java' },
          to: { label: NodeLabel.CLASS, name: 'Base', file: 'core/Base.java' },
        },
      ]);
    });

    it('links parameter types that resolve to one declaration', () => {
      expect(edges.parameterTypes).toEqual([
        {
          method_signature: 'app.A#a(Base,int):void',
          index: 0,
          target: { label: NodeLabel.CLASS, name: 'Base', file: 'core/Base.java' },
        },
      ]);
    });

    it('resolves each call kind to exactly one callee', () => {
      expect(edges.calls).toEqual([
        { caller: 'app.A#a(Base,int):void', callee: 'app.A#b():void', call_type: CallKind.SAME_CLASS },
        {
          caller: 'app.A#a(Base,int):void',
          callee: 'core.Base#close():void',
          call_type: CallKind.SUPER,
          qualifier: 'super',
        },
        {
          caller: 'app.A#a(Base,int):void',
          callee: 'core.Util#format():String',
          call_type: CallKind.STATIC,
          qualifier: 'Util',
        },
        {
          caller: 'app.A#a(Base,int):void',
          callee: 'core.Base#close():void',
          call_type: CallKind.INSTANCE,
          qualifier: 'resource',
        },
        {
          caller: 'app.A#c():void',
          callee: 'app.A#b():void',
          call_type: CallKind.THIS,
          qualifier: 'this',
        },
        {
          caller: 'app.A#c():void',
          callee: 'core.Util#format():String',
          call_type: CallKind.INSTANCE,
          qualifier: 'fmt',
        },
      ]);
    });

    it('targets classes only for constructor calls', () => {
      expect(edges.constructors).toEqual([
        {
          caller: 'app.A#a(Base,int):void',
          target: { label: NodeLabel.CLASS, name: 'Base', file: 'core/Base.java' },
        },
      ]);
    });
  });

  it('drops calls when several methods match', () => {
    const file = makeFile('A.java', {
      classes: [makeClass('A', 'A.java')],
      methods: [
        makeMethod({ name: 'b', className: 'A', file: 'A.java', parameters: [makeParameter('x', 'int', 0)] }),
        makeMethod({ name: 'b', className: 'A', file: 'A.java', parameters: [makeParameter('x', 'long', 0)] }),
        makeMethod({ name: 'a', className: 'A', file: 'A.java', calls: [call('b', CallKind.SAME_CLASS, 'A')] }),
      ],
    });

    expect(new SymbolResolver([file]).resolveAll().calls).toEqual([]);
  });
});
