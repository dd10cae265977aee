import { BaseClient, type ClientConfig } from "./baseClient.js";
import type {
  CreateRoadRequest,
  Road,
  RoadDirection,
  UpdateDirectionRequest,
  UpdateRoadRequest,
} from "./types.js";

export class RoadClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/roads", config);
  }

  public async createRoad(request: CreateRoadRequest): Promise<Road> {
    return this.client.post<Road>({ body: request });
  }

  public async getRoad(roadId: string): Promise<Road> {
    return this.client.get<Road>({ path: encodeURIComponent(roadId) });
  }

  /** Change identification, length or speeds; all given values apply or none */
  public async updateRoad(roadId: string, request: UpdateRoadRequest): Promise<Road> {
    return this.client.patch<Road>({ path: encodeURIComponent(roadId), body: request });
  }

  public async updateDirection(
    roadId: string,
    direction: RoadDirection,
    request: UpdateDirectionRequest,
  ): Promise<Road> {
    return this.client.put<Road>({
      path: `${encodeURIComponent(roadId)}/directions/${direction}`,
      body: request,
    });
  }

  /** Terminate a road, removing it from every route that uses it */
  public async terminateRoad(roadId: string): Promise<Road> {
    return this.client.delete<Road>({ path: encodeURIComponent(roadId) });
  }
}
