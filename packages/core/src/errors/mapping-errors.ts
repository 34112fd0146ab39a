import { Data } from "effect";

export class MappingError extends Data.TaggedError("MappingError")<{
	readonly entity: string;
	readonly reason: string;
	readonly message: string;
}> {}
