import type { CreateDatasetRequest, DatasetId } from "@geoengine-ts/types";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import { createDatasetSchema, parseResponse, uploadSchema } from "./schemas.js";

/** A file to upload: its name and contents */
export interface UploadFile {
  name: string;
  content: string | Blob;
  contentType?: string;
}

export class DatasetClient {
  private uploads: BaseClient;
  private datasets: BaseClient;

  constructor(config: ClientConfig) {
    this.uploads = new BaseClient("upload", config);
    this.datasets = new BaseClient("dataset", config);
  }

  /** Upload files as multipart form data, returning the upload id */
  public async upload(files: UploadFile[]): Promise<string> {
    const form = new FormData();
    for (const file of files) {
      const blob =
        typeof file.content === "string"
          ? new Blob([file.content], { type: file.contentType ?? "application/octet-stream" })
          : file.content;
      form.append(file.name, blob, file.name);
    }

    const body = await this.uploads.post<unknown>({
      body: form,
      headers: { "Content-Type": "multipart/form-data" },
    });
    return parseResponse(uploadSchema, body, "upload").id;
  }

  /** Create a dataset from a previous upload */
  public async create(request: CreateDatasetRequest): Promise<DatasetId> {
    const body = await this.datasets.post<unknown>({ body: request });
    return parseResponse(createDatasetSchema, body, "dataset creation").id;
  }
}
