/**
 * Prebuilt, parametrized Cypher over the fact graph:
 * (:Entity {name})-[:RELATION {name, source}]->(:Entity {name})
 *
 * `source` on RELATION is the id of the document the fact came from.
 */

import { int } from "neo4j-driver";
import type { GraphQuery } from "../types";

export const DEFAULT_GRAPH_LIMIT = 20;

/** Facts whose subject, predicate or object mentions any keyword (case-insensitive) */
export function keywordFactsQuery(keywords: string[], limit = DEFAULT_GRAPH_LIMIT): GraphQuery {
	return {
		cypher: [
			"MATCH (s:Entity)-[r:RELATION]->(o:Entity)",
			"WHERE ANY(keyword IN $keywords WHERE",
			"  toLower(s.name) CONTAINS keyword OR",
			"  toLower(o.name) CONTAINS keyword OR",
			"  toLower(r.name) CONTAINS keyword)",
			"RETURN s.name AS subject, r.name AS predicate, o.name AS object, r.source AS source",
			"LIMIT $limit",
		].join("\n"),
		params: { keywords: keywords.map((k) => k.toLowerCase()), limit: int(limit) },
	};
}

/** Every relation touching an entity, with its direction */
export function entityNeighborsQuery(entityName: string, limit = DEFAULT_GRAPH_LIMIT): GraphQuery {
	return {
		cypher: [
			"MATCH (e:Entity {name: $name})-[r:RELATION]-(other:Entity)",
			"RETURN e.name AS entity, r.name AS relation, other.name AS related_entity, r.source AS source,",
			"  CASE WHEN startNode(r) = e THEN 'outgoing' ELSE 'incoming' END AS direction",
			"LIMIT $limit",
		].join("\n"),
		params: { name: entityName, limit: int(limit) },
	};
}

/**
 * Paths of up to `maxDepth` hops between two entities. Variable-length bounds
 * cannot be parameters, so the depth is validated and inlined.
 */
export function entityPathsQuery(
	startEntity: string,
	endEntity: string,
	maxDepth = 3,
	limit = 5,
): GraphQuery {
	if (!Number.isInteger(maxDepth) || maxDepth < 1 || maxDepth > 6) {
		throw new RangeError(`maxDepth must be an integer between 1 and 6, got ${maxDepth}`);
	}
	return {
		cypher: [
			`MATCH path = (a:Entity {name: $start})-[:RELATION*1..${maxDepth}]-(b:Entity {name: $end})`,
			"RETURN [node IN nodes(path) | node.name] AS entities,",
			"  [rel IN relationships(path) | rel.name] AS relations,",
			"  [rel IN relationships(path) | rel.source] AS sources",
			"LIMIT $limit",
		].join("\n"),
		params: { start: startEntity, end: endEntity, limit: int(limit) },
	};
}

/** Node and relation totals, for status output */
export function graphStatsQuery(): GraphQuery {
	return {
		cypher: [
			"MATCH (e:Entity) WITH count(e) AS entities",
			"OPTIONAL MATCH ()-[r:RELATION]->()",
			"RETURN entities, count(r) AS relations",
		].join("\n"),
		params: {},
	};
}
