import { BaseClient, type ClientConfig } from "./baseClient.js";
import type {
  CreateRouteRequest,
  Route,
  RouteLengthResponse,
  RouteLocationsResponse,
  RouteTraversableResponse,
  RouteTravelTimeResponse,
  SegmentRef,
} from "./types.js";

export class RouteClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/routes", config);
  }

  public async createRoute(request: CreateRouteRequest): Promise<Route> {
    return this.client.post<Route>({ body: request });
  }

  public async getRoute(routeId: string): Promise<Route> {
    return this.client.get<Route>({ path: encodeURIComponent(routeId) });
  }

  /** Terminate a route and, in cascade, its segments */
  public async terminateRoute(routeId: string): Promise<Route> {
    return this.client.delete<Route>({ path: encodeURIComponent(routeId) });
  }

  public async addSegment(routeId: string, segment: SegmentRef): Promise<Route> {
    return this.client.post<Route>({ path: `${encodeURIComponent(routeId)}/segments`, body: segment });
  }

  public async changeSegment(routeId: string, index: number, segment: SegmentRef): Promise<Route> {
    return this.client.put<Route>({
      path: `${encodeURIComponent(routeId)}/segments/${index}`,
      body: segment,
    });
  }

  public async removeSegment(routeId: string, index: number): Promise<Route> {
    return this.client.delete<Route>({ path: `${encodeURIComponent(routeId)}/segments/${index}` });
  }

  public async getTotalLength(routeId: string): Promise<RouteLengthResponse> {
    return this.client.get<RouteLengthResponse>({ path: `${encodeURIComponent(routeId)}/length` });
  }

  public async isTraversable(routeId: string): Promise<RouteTraversableResponse> {
    return this.client.get<RouteTraversableResponse>({ path: `${encodeURIComponent(routeId)}/traversable` });
  }

  public async getLocationsVisited(routeId: string): Promise<RouteLocationsResponse> {
    return this.client.get<RouteLocationsResponse>({ path: `${encodeURIComponent(routeId)}/locations` });
  }

  public async estimateTravelTime(routeId: string): Promise<RouteTravelTimeResponse> {
    return this.client.get<RouteTravelTimeResponse>({ path: `${encodeURIComponent(routeId)}/travel-time` });
  }
}
