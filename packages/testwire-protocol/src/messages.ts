// ============================================================================
// testwire Protocol - Message Types
// The closed set of messages exchanged between the runner and a worker.
// Every inbound frame is validated against these schemas before it is routed.
// ============================================================================

import { z } from 'zod';

/** Protocol version spoken by this runner; the worker's hello must match */
export const PROTOCOL_VERSION = 1;

/** Token carried by connection-level messages (hello, unscoped diagnostics) */
export const CONNECTION_TOKEN = '';

function envelope<K extends string, P extends z.ZodTypeAny>(kind: K, payload: P) {
	return z.object({
		operationToken: z.string(),
		messageKind: z.literal(kind),
		payload,
	});
}

// ---------------------------------------------------------------------------
// Request options - shaped from RunnerSettings by the runner package
// ---------------------------------------------------------------------------

const traitMap = z.record(z.array(z.string()));

export const testFiltersSchema = z.object({
	includedClasses: z.array(z.string()),
	excludedClasses: z.array(z.string()),
	includedMethods: z.array(z.string()),
	excludedMethods: z.array(z.string()),
	includedNamespaces: z.array(z.string()),
	excludedNamespaces: z.array(z.string()),
	includedTraits: traitMap,
	excludedTraits: traitMap,
});

export const findOptionsSchema = z.object({
	preEnumerateTheories: z.boolean(),
	/** null = worker default culture, '' = invariant culture */
	culture: z.string().nullable(),
	diagnosticMessages: z.boolean(),
	internalDiagnosticMessages: z.boolean(),
});

export const executionOptionsSchema = z.object({
	parallelizeAssembly: z.boolean(),
	parallelizeTestCollections: z.boolean(),
	/** null = worker default, -1 = unlimited */
	maxParallelThreads: z.number().int().nullable(),
	stopOnFail: z.boolean(),
	failSkips: z.boolean(),
});

export type TestFilters = z.infer<typeof testFiltersSchema>;
export type FindOptions = z.infer<typeof findOptionsSchema>;
export type ExecutionOptions = z.infer<typeof executionOptionsSchema>;

// ---------------------------------------------------------------------------
// Runner -> worker requests
// ---------------------------------------------------------------------------

export const findRequestSchema = envelope(
	'find',
	z.object({ options: findOptionsSchema, filters: testFiltersSchema }),
);

export const findAndRunRequestSchema = envelope(
	'find-and-run',
	z.object({
		options: findOptionsSchema,
		filters: testFiltersSchema,
		execution: executionOptionsSchema,
	}),
);

export const runnerRequestSchema = z.discriminatedUnion('messageKind', [
	findRequestSchema,
	findAndRunRequestSchema,
]);

export type RunnerRequest = z.infer<typeof runnerRequestSchema>;
export type FindRequest = z.infer<typeof findRequestSchema>;
export type FindAndRunRequest = z.infer<typeof findAndRunRequestSchema>;

// ---------------------------------------------------------------------------
// Worker -> runner messages
// ---------------------------------------------------------------------------

const testCaseRef = {
	testCaseUniqueId: z.string(),
	displayName: z.string(),
};

export const workerMessageSchema = z.discriminatedUnion('messageKind', [
	// Connection level
	envelope(
		'hello',
		z.object({
			protocolVersion: z.number().int(),
			testFrameworkDisplayName: z.string(),
			testAssemblyUniqueId: z.string(),
			targetFramework: z.string().optional(),
		}),
	),
	envelope('diagnostic', z.object({ message: z.string() })),
	envelope('internal-diagnostic', z.object({ message: z.string() })),
	envelope('error', z.object({ message: z.string(), stackTrace: z.string().optional() })),

	// Discovery
	envelope('discovery-starting', z.object({})),
	envelope(
		'test-case-discovered',
		z.object({
			...testCaseRef,
			className: z.string().optional(),
			methodName: z.string().optional(),
			namespace: z.string().optional(),
			traits: traitMap.default({}),
		}),
	),
	envelope('discovery-progress', z.object({ discovered: z.number().int().nonnegative() })),
	envelope('discovery-complete', z.object({ testCasesToRun: z.number().int().nonnegative() })),

	// Execution
	envelope('run-starting', z.object({ testCaseCount: z.number().int().nonnegative() })),
	envelope('test-starting', z.object(testCaseRef)),
	envelope('test-passed', z.object({ ...testCaseRef, duration: z.number().nonnegative() })),
	envelope(
		'test-failed',
		z.object({
			...testCaseRef,
			duration: z.number().nonnegative(),
			message: z.string(),
			stackTrace: z.string().optional(),
		}),
	),
	envelope('test-skipped', z.object({ ...testCaseRef, reason: z.string() })),
	envelope('test-output', z.object({ testCaseUniqueId: z.string(), output: z.string() })),
	envelope(
		'run-complete',
		z.object({
			testsTotal: z.number().int().nonnegative(),
			testsFailed: z.number().int().nonnegative(),
			testsSkipped: z.number().int().nonnegative(),
			duration: z.number().nonnegative(),
		}),
	),
]);

export type WorkerMessage = z.infer<typeof workerMessageSchema>;
export type MessageKind = WorkerMessage['messageKind'];

/** Narrow WorkerMessage to one kind */
export type MessageOf<K extends MessageKind> = Extract<WorkerMessage, { messageKind: K }>;

/** Anything that can travel over the wire in either direction */
export type WireMessage = WorkerMessage | RunnerRequest;

/** Type guard for a specific message kind */
export function isMessageKind<K extends MessageKind>(
	message: WorkerMessage,
	kind: K,
): message is MessageOf<K> {
	return message.messageKind === kind;
}

/**
 * Callback that receives the messages for one operation, in wire order.
 * Return false to stop receiving messages for that operation.
 */
export type MessageSink = (message: WorkerMessage) => boolean;
