import * as path from 'path'
import {
  OBJECT_KIND_ORDER,
  fileStemOf,
  getKindDefinition,
  toIdentifier,
  toObjectRecord,
  type ObjectKind
} from './object-kinds'
import type {
  GroupingMode,
  InventoryObject,
  ObjectIdentifier,
  ObjectRecord,
  ScriptOptions,
  ScriptRequest,
  WorkItem
} from './types'
import { wildcardToRegExp } from './utils'

export interface GroupingPolicy {
  defaultMode: GroupingMode
  overrides: Partial<Record<ObjectKind, GroupingMode>>
  appendToExistingFiles: boolean
  scriptOptions: ScriptOptions
}

export interface ObjectFilters {
  includeObjectKinds: readonly ObjectKind[]
  excludeObjectKinds: readonly ObjectKind[]
  includeObjects: readonly string[]
  excludeObjects: readonly string[]
  includeData: boolean
}

const INVALID_FILE_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g

export function sanitizeFileName(name: string): string {
  return name.replace(INVALID_FILE_CHARS, '_')
}

function compareOrdinal(a: string, b: string): number {
  const left = a.toLowerCase()
  const right = b.toLowerCase()
  if (left < right) return -1
  if (left > right) return 1
  return a < b ? -1 : a > b ? 1 : 0
}

export function groupingModeFor(kind: ObjectKind, policy: GroupingPolicy): GroupingMode {
  return getKindDefinition(kind).forcedGrouping ?? policy.overrides[kind] ?? policy.defaultMode
}

/**
 * Grouping mode written to the export metadata: `single` only when every kind
 * without a forced mode writes one file per object
 */
export function effectiveGroupingMode(policy: GroupingPolicy): GroupingMode {
  const grouped = OBJECT_KIND_ORDER.filter((kind) => !getKindDefinition(kind).forcedGrouping)
    .map((kind) => groupingModeFor(kind, policy))
    .find((mode) => mode !== 'single')
  return grouped ?? 'single'
}

export function isKindSelected(kind: ObjectKind, filters: ObjectFilters): boolean {
  if (kind === 'TableData' && !filters.includeData) return false
  if (filters.includeObjectKinds.length > 0) return filters.includeObjectKinds.includes(kind)
  return !filters.excludeObjectKinds.includes(kind)
}

function nameCandidates(object: InventoryObject): string[] {
  const candidates = [object.name]
  if (object.ownerGroup) candidates.push(`${object.ownerGroup}.${object.name}`)
  if (object.parent) {
    candidates.push(`${object.parent.ownerGroup}.${object.parent.name}`)
    candidates.push(`${object.parent.ownerGroup}.${object.parent.name}.${object.name}`)
  }
  return candidates
}

export function matchesObjectFilters(object: InventoryObject, filters: ObjectFilters): boolean {
  const candidates = nameCandidates(object)
  const matches = (patterns: readonly string[]) =>
    patterns.some((pattern) => {
      const regex = wildcardToRegExp(pattern)
      return candidates.some((candidate) => regex.test(candidate))
    })

  if (filters.includeObjects.length > 0 && !matches(filters.includeObjects)) return false
  return !matches(filters.excludeObjects)
}

export function filterInventory(
  inventory: readonly InventoryObject[],
  filters: ObjectFilters
): InventoryObject[] {
  return inventory.filter(
    (object) => isKindSelected(object.kind, filters) && matchesObjectFilters(object, filters)
  )
}

/**
 * Output path (relative, forward slashes) of one group of identifiers.
 * Depends only on kind, grouping mode and the identifiers themselves.
 */
export function outputPathFor(
  kind: ObjectKind,
  mode: GroupingMode,
  identifiers: readonly ObjectIdentifier[],
  groupIndex = 0
): string {
  const definition = getKindDefinition(kind)
  const first = identifiers[0]

  switch (mode) {
    case 'single': {
      if (!first || identifiers.length !== 1) {
        throw new Error(`Modo single exige exatamente um objeto (${kind})`)
      }
      return `${definition.folder}/${sanitizeFileName(fileStemOf(kind, first))}${definition.suffix}`
    }
    case 'byGroup': {
      const group = first?.ownerGroup ?? definition.label
      const number = String(groupIndex + 1).padStart(3, '0')
      return `${definition.folder}/${number}_${sanitizeFileName(group)}${definition.suffix}`
    }
    case 'all':
      return `${definition.folder}/001_${definition.label}${definition.suffix}`
  }
}

function groupIdentifiers(
  mode: GroupingMode,
  identifiers: ObjectIdentifier[]
): ObjectIdentifier[][] {
  switch (mode) {
    case 'single':
      return identifiers.map((identifier) => [identifier])
    case 'all':
      return [identifiers]
    case 'byGroup': {
      const groups = new Map<string, ObjectIdentifier[]>()
      for (const identifier of identifiers) {
        const key = identifier.ownerGroup ?? ''
        const members = groups.get(key) ?? []
        members.push(identifier)
        groups.set(key, members)
      }
      return [...groups.keys()].sort(compareOrdinal).map((key) => groups.get(key) ?? [])
    }
  }
}

/**
 * Turns the inventory into one WorkItem per output file, in phase order
 */
export function buildWorkItems(
  inventory: readonly InventoryObject[],
  policy: GroupingPolicy,
  filters: ObjectFilters
): WorkItem[] {
  const selected = filterInventory(inventory, filters)
  const items: WorkItem[] = []
  const seenPaths = new Set<string>()

  for (const kind of OBJECT_KIND_ORDER) {
    const identifiers = selected
      .filter((object) => object.kind === kind)
      .map(toIdentifier)
      .sort((a, b) => compareOrdinal(fileStemOf(kind, a), fileStemOf(kind, b)))

    if (identifiers.length === 0) continue

    const definition = getKindDefinition(kind)
    const mode = groupingModeFor(kind, policy)

    groupIdentifiers(mode, identifiers).forEach((group, groupIndex) => {
      const outputPath = outputPathFor(kind, mode, group, groupIndex)
      const normalizedPath = outputPath.toLowerCase()

      if (seenPaths.has(normalizedPath)) {
        throw new Error(`Caminho de saída duplicado: ${outputPath}`)
      }
      seenPaths.add(normalizedPath)

      items.push({
        id: `${kind}:${outputPath}`,
        objectKind: kind,
        groupingMode: mode,
        objectIdentifiers: group,
        outputPath,
        appendToExistingFile: policy.appendToExistingFiles,
        scriptOptions: { ...definition.scriptOptions, ...policy.scriptOptions },
        specialHandling: definition.specialHandling
      })
    })
  }

  return items
}

/**
 * The scripting calls a WorkItem expands to. Only the first call may truncate
 * the file; every later identifier appends to it.
 */
export function resolveScriptRequests(item: WorkItem, outputRoot: string): ScriptRequest[] {
  const absolutePath = path.join(outputRoot, ...item.outputPath.split('/'))

  return item.objectIdentifiers.map((identifier, index) => ({
    kind: item.objectKind,
    ownerGroup: identifier.ownerGroup,
    name: identifier.name,
    extra: identifier.extra,
    optionOverrides: item.scriptOptions,
    outputPath: absolutePath,
    append: index > 0 || item.appendToExistingFile,
    specialHandling: item.specialHandling
  }))
}

export function recordsOf(item: WorkItem): ObjectRecord[] {
  return item.objectIdentifiers.map((identifier) =>
    toObjectRecord(item.objectKind, identifier, item.outputPath)
  )
}
