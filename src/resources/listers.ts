import { type GcloudOptions, type ListOutcome, gcloudList } from "../lib/gcloud.js";
import { RESOURCE_TYPES, type ResourceKind, type ResourceType } from "./kinds.js";

/** Lists one resource type for one project. */
export interface ResourceLister {
	readonly kind: ResourceKind;
	list(project: string): Promise<ListOutcome>;
}

export class GcloudResourceLister implements ResourceLister {
	readonly kind: ResourceKind;

	constructor(
		private readonly type: ResourceType,
		private readonly gcloud: GcloudOptions,
	) {
		this.kind = type.kind;
	}

	list(project: string): Promise<ListOutcome> {
		return gcloudList(this.gcloud, this.type.args, project);
	}
}

export function gcloudListers(gcloud: GcloudOptions): ResourceLister[] {
	return RESOURCE_TYPES.map((t) => new GcloudResourceLister(t, gcloud));
}
