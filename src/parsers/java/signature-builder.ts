/**
 * Canonical method identifier: `<package>.<Type>#<name>(<T1>,<T2>):<Return>`.
 *
 * Package and type segments are omitted when unknown, an unknown parameter
 * type renders as `?` and a missing return type as `void`. Parameter types are
 * written in declaration order, so overloads and reorderings get distinct
 * signatures.
 */
export function buildMethodSignature(
  packageName: string | undefined,
  declaringType: string | undefined,
  methodName: string,
  parameterTypes: ReadonlyArray<string | undefined>,
  returnType?: string
): string {
  const pkg = packageName ? `${packageName}.` : '';
  const params = parameterTypes.map(type => (type ? type : '?')).join(',');
  const ret = returnType ? returnType : 'void';

  if (declaringType) {
    return `${pkg}${declaringType}#${methodName}(${params}):${ret}`;
  }
  return `${pkg}${methodName}(${params}):${ret}`;
}
