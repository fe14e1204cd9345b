import { Binary, Collection, Db, ObjectId } from "mongodb";
import type {
  HouseRequest,
  HouseRequestDocument,
  HouseRequestSummary,
  NewHouseRequest,
} from "../types/house";

const COLLECTION = "house_requests";

export interface HouseRequestStore {
  insert(request: NewHouseRequest): Promise<string>;
  findById(id: string): Promise<HouseRequest | null>;
  /** Newest first */
  listRecent(limit: number): Promise<HouseRequestSummary[]>;
}

export function toSummary(request: HouseRequest): HouseRequestSummary {
  const { chatHistory: _history, finalPrompt: _prompt, glb: _glb, svg: _svg, ...summary } = request;
  return summary;
}

function fromDocument({ _id, glb, ...rest }: HouseRequestDocument & { _id: ObjectId }): HouseRequest {
  return { ...rest, id: _id.toHexString(), glb: glb.buffer.slice(0, glb.position) };
}

export class MongoHouseRequestStore implements HouseRequestStore {
  private readonly requests: Collection<HouseRequestDocument>;

  constructor(db: Db) {
    this.requests = db.collection<HouseRequestDocument>(COLLECTION);
  }

  async insert(request: NewHouseRequest): Promise<string> {
    const result = await this.requests.insertOne({
      ...request,
      glb: new Binary(request.glb),
      createdAt: new Date(),
    });
    return result.insertedId.toHexString();
  }

  async findById(id: string): Promise<HouseRequest | null> {
    if (!ObjectId.isValid(id)) return null;
    const doc = await this.requests.findOne({ _id: new ObjectId(id) });
    return doc ? fromDocument(doc) : null;
  }

  async listRecent(limit: number): Promise<HouseRequestSummary[]> {
    const docs = await this.requests
      .find({}, { projection: { chatHistory: 0, finalPrompt: 0, glb: 0, svg: 0 } })
      .sort({ createdAt: -1 })
      .limit(limit)
      .toArray();

    return docs.map(({ _id, ...rest }) => ({
      id: _id.toHexString(),
      bhk: rest.bhk,
      sqft: rest.sqft,
      facing: rest.facing,
      style: rest.style,
      pincode: rest.pincode,
      rate: rest.rate,
      costEstimate: rest.costEstimate,
      planText: rest.planText,
      scenePath: rest.scenePath,
      createdAt: rest.createdAt,
    }));
  }
}
