/**
 * Collection coordinator — brings a set of independently labeled series
 * onto one shared time unit.
 *
 * The target label is resolved once; each member is then converted
 * against its own unit. A member that fails keeps its place in the
 * collection, unconverted, and its error is reported in the outcomes.
 *
 * Dependencies flow downward only: Orchestration → Conversion, Resolver, Types.
 */

import type { UnitDescriptor } from "../types/unit.js";
import type { ConversionError, UnrecognizedUnitError } from "../types/errors.js";
import type { Result } from "../types/result.js";
import type {
  CollectionConversion,
  CollectionMember,
  ConversionOptions,
  MemberOutcome,
  SeriesCollection,
  SeriesRecord,
  UnresolvedTimeAxis,
} from "../types/series.js";
import { descriptorsEqual } from "../types/unit.js";
import { ok, err } from "../types/result.js";
import { unrecognizedUnit } from "../types/errors.js";
import { resolveUnit } from "../resolver/resolver.js";
import { DEFAULT_TIME_UNIT } from "../resolver/unit-families.js";
import { createTimeAxis, convertAxisTo, labelOrDefault } from "../conversion/time-axis.js";
import { checkShape } from "../conversion/permutation.js";

/**
 * Error produced when a caller requires every member to have converted.
 */
export interface CollectionConversionError {
  readonly message: string;
  readonly memberErrors: readonly MemberConversionError[];
}

/**
 * Records the failure of a single member.
 */
export interface MemberConversionError {
  readonly id: string;
  readonly error: ConversionError;
}

function convertMember<V>(
  member: CollectionMember<V>,
  target: UnitDescriptor,
  targetLabel: string,
  options: ConversionOptions | undefined,
): { member: CollectionMember<V>; outcome: MemberOutcome } {
  if (member.error !== undefined) {
    return { member, outcome: { id: member.id, ok: false, error: member.error } };
  }
  const source = member.axis;
  if (source.descriptor === undefined) {
    const error = unrecognizedUnit(source.label);
    return { member: { ...member, error }, outcome: { id: member.id, ok: false, error } };
  }
  if (member.values !== undefined) {
    const shape = checkShape(source.times.length, member.values);
    if (!shape.ok) {
      return {
        member: { ...member, error: shape.error },
        outcome: { id: member.id, ok: false, error: shape.error },
      };
    }
  }

  const { axis, reordered } = convertAxisTo(source, target, targetLabel, options);
  const values = member.values !== undefined && reordered
    ? [...member.values].reverse()
    : member.values;

  return {
    member: { id: member.id, axis, values },
    outcome: { id: member.id, ok: true, reordered },
  };
}

/**
 * Convert every member of a collection to the unit named by `targetLabel`.
 *
 * Behavior:
 * - An absent target leaves the collection untouched; members are
 *   reported as not reordered, or with the error they were built with.
 * - An unrecognized target fails the whole call; no member can convert.
 * - Each member is reversed, or not, independently of its siblings.
 * - A member carrying an error is passed through and reported again.
 */
export function convertCollection<V>(
  collection: SeriesCollection<V>,
  targetLabel: string | undefined,
  options?: ConversionOptions,
): Result<CollectionConversion<V>, UnrecognizedUnitError> {
  if (targetLabel === undefined) {
    return ok({
      collection,
      outcomes: collection.members.map((m): MemberOutcome => m.error !== undefined
        ? { id: m.id, ok: false, error: m.error }
        : { id: m.id, ok: true, reordered: false }),
    });
  }

  const target = resolveUnit(targetLabel);
  if (!target.ok) {
    return target;
  }

  const label = labelOrDefault(targetLabel);
  const members: CollectionMember<V>[] = [];
  const outcomes: MemberOutcome[] = [];
  for (const member of collection.members) {
    const converted = convertMember(member, target.value, label, options);
    members.push(converted.member);
    outcomes.push(converted.outcome);
  }

  return ok({
    collection: { members, timeUnit: label },
    outcomes,
  });
}

/**
 * Build a collection from independently labeled records.
 *
 * A record whose own label is unrecognized, or whose values do not match
 * its times, is kept unconverted and reported as a failed member. When
 * `timeUnit` is given, every other member is converted to it as part of
 * construction.
 */
export function createCollection<V>(
  records: readonly SeriesRecord<V>[],
  timeUnit?: string,
  options?: ConversionOptions,
): Result<CollectionConversion<V>, UnrecognizedUnitError> {
  let target: UnitDescriptor | undefined;
  if (timeUnit !== undefined) {
    const resolved = resolveUnit(timeUnit);
    if (!resolved.ok) {
      return resolved;
    }
    target = resolved.value;
  }

  const members: CollectionMember<V>[] = [];
  const outcomes: MemberOutcome[] = [];

  for (const record of records) {
    const axis = createTimeAxis(record.times, record.timeUnit);
    if (!axis.ok) {
      const unresolved: UnresolvedTimeAxis = {
        times: [...record.times],
        label: record.timeUnit ?? DEFAULT_TIME_UNIT,
        descriptor: undefined,
        log: [],
      };
      members.push({ id: record.id, axis: unresolved, values: record.values, error: axis.error });
      outcomes.push({ id: record.id, ok: false, error: axis.error });
      continue;
    }

    const member: CollectionMember<V> = { id: record.id, axis: axis.value, values: record.values };

    if (timeUnit === undefined || target === undefined) {
      const shape = record.values !== undefined
        ? checkShape(record.times.length, record.values)
        : ok(undefined);
      if (shape.ok) {
        members.push(member);
        outcomes.push({ id: record.id, ok: true, reordered: false });
      } else {
        members.push({ ...member, error: shape.error });
        outcomes.push({ id: record.id, ok: false, error: shape.error });
      }
      continue;
    }

    const converted = convertMember(member, target, labelOrDefault(timeUnit), options);
    members.push(converted.member);
    outcomes.push(converted.outcome);
  }

  return ok({
    collection: { members, timeUnit: timeUnit === undefined ? undefined : labelOrDefault(timeUnit) },
    outcomes,
  });
}

/**
 * Aggregate view of a conversion: the collection when every member
 * converted, otherwise an error naming each failing member.
 */
export function requireAllConverted<V>(
  conversion: CollectionConversion<V>,
): Result<SeriesCollection<V>, CollectionConversionError> {
  const memberErrors: MemberConversionError[] = [];
  for (const outcome of conversion.outcomes) {
    if (!outcome.ok) {
      memberErrors.push({ id: outcome.id, error: outcome.error });
    }
  }
  if (memberErrors.length > 0) {
    return err({
      message: `${memberErrors.length} member(s) failed to convert: ${memberErrors.map((e) => e.id).join(", ")}`,
      memberErrors,
    });
  }
  return ok(conversion.collection);
}

/**
 * Whether every member of the collection is on the same unit. A member
 * with an unrecognized unit shares it with nobody.
 */
export function hasCommonTimeUnit<V>(collection: SeriesCollection<V>): boolean {
  const descriptors: UnitDescriptor[] = [];
  for (const member of collection.members) {
    if (member.axis.descriptor === undefined) {
      return false;
    }
    descriptors.push(member.axis.descriptor);
  }
  const [first, ...rest] = descriptors;
  if (first === undefined) {
    return true;
  }
  return rest.every((d) => descriptorsEqual(d, first));
}
