import type {
  ProvenanceEntry,
  ResultDescriptorResponse,
  WorkflowDefinition,
  WorkflowId,
} from "@geoengine-ts/types";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import {
  parseResponse,
  provenanceSchema,
  registerWorkflowSchema,
  resultDescriptorSchema,
  workflowDefinitionSchema,
} from "./schemas.js";

export class WorkflowClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("workflow", config);
  }

  /** Register a workflow definition, returning its id */
  public async register(definition: WorkflowDefinition): Promise<WorkflowId> {
    const body = await this.client.post<unknown>({ body: definition });
    return parseResponse(registerWorkflowSchema, body, "workflow registration").id;
  }

  /** Load the operator graph behind an id */
  public async getDefinition(id: WorkflowId): Promise<WorkflowDefinition> {
    const body = await this.client.get<unknown>({ path: encodeURIComponent(id) });
    return parseResponse(workflowDefinitionSchema, body, "workflow definition");
  }

  /** Load the result descriptor of a workflow */
  public async getMetadata(id: WorkflowId): Promise<ResultDescriptorResponse> {
    const body = await this.client.get<unknown>({
      path: `${encodeURIComponent(id)}/metadata`,
    });
    return parseResponse(resultDescriptorSchema, body, "result descriptor");
  }

  /** Citation and license of every dataset the workflow reads */
  public async getProvenance(id: WorkflowId): Promise<ProvenanceEntry[]> {
    const body = await this.client.get<unknown>({
      path: `${encodeURIComponent(id)}/provenance`,
    });
    return parseResponse(provenanceSchema, body, "provenance");
  }
}
