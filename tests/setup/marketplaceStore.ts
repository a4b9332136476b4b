import {
  InMemoryStore,
  StoreFailure,
  setupSupabaseMock,
  type Row,
  type SchemaDefinition,
} from "./supabaseClientMock";

const TIERS = ["basic", "standard", "premium"] as const;
type Tier = (typeof TIERS)[number];

function text(args: Row, key: string): string | null {
  const value = args[key];
  return typeof value === "string" ? value : null;
}

function num(args: Row, key: string): number | null {
  const value = args[key];
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return null;
}

function strings(args: Row, key: string): string[] | null {
  const value = args[key];
  return Array.isArray(value) ? value.map(String) : null;
}

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function objects(args: Row, key: string): Row[] {
  const value = args[key];
  return Array.isArray(value) ? value.filter(isRow) : [];
}

function tierRank(value: unknown) {
  return TIERS.findIndex((tier) => tier === value);
}

function minimum(values: unknown[]): number | null {
  const numbers = values.filter((value): value is number => typeof value === "number");
  return numbers.length ? Math.min(...numbers) : null;
}

function offerSummaries(store: InMemoryStore): Row[] {
  const users = store.rows("users");
  const details = store.rows("offer_details");
  return store.rows("offers").map((offer) => {
    const creator = users.find((user) => user.id === offer.creator_id) ?? {};
    const tiers = details.filter((detail) => detail.offer_id === offer.id);
    return {
      ...offer,
      min_price: minimum(tiers.map((detail) => detail.price)),
      min_delivery_time: minimum(tiers.map((detail) => detail.delivery_time_in_days)),
      creator_username: creator.username ?? null,
      creator_first_name: creator.first_name ?? null,
      creator_last_name: creator.last_name ?? null,
    };
  });
}

function profileDetails(store: InMemoryStore): Row[] {
  return store.rows("users").map((user) => {
    const table = user.user_type === "business" ? "business_profiles" : "customer_profiles";
    const profile = store.find(table, (row) => row.user_id === user.id);
    const profileEmail = profile?.email;
    return {
      user: user.id,
      username: user.username,
      first_name: user.first_name,
      last_name: user.last_name,
      file: profile?.file ?? null,
      location: profile?.location ?? null,
      tel: profile?.tel ?? null,
      description: profile?.description ?? null,
      working_hours: user.user_type === "business" ? (profile?.working_hours ?? null) : "",
      type: user.user_type,
      email: typeof profileEmail === "string" && profileEmail !== "" ? profileEmail : user.email,
      created_at: profile?.created_at ?? null,
    };
  });
}

function reviewStats(store: InMemoryStore): Row[] {
  const ratings = store
    .rows("reviews")
    .map((review) => review.rating)
    .filter((rating): rating is number => typeof rating === "number");
  const total = ratings.reduce((sum, rating) => sum + rating, 0);
  return [
    {
      review_count: ratings.length,
      average_rating: ratings.length ? total / ratings.length : null,
    },
  ];
}

function detailValues(detail: Row) {
  return {
    title: text(detail, "title"),
    revisions: num(detail, "revisions"),
    delivery_time_in_days: num(detail, "delivery_time_in_days"),
    price: num(detail, "price"),
    features: strings(detail, "features"),
  };
}

function registerAccount(args: Row, store: InMemoryStore) {
  const userType = text(args, "p_user_type");
  const email = text(args, "p_email") ?? "";
  const user = store.insert("users", {
    auth_user_id: text(args, "p_auth_user_id"),
    username: text(args, "p_username"),
    email,
    first_name: text(args, "p_first_name") ?? "",
    last_name: text(args, "p_last_name") ?? "",
    user_type: userType,
  });
  store.insert(userType === "business" ? "business_profiles" : "customer_profiles", {
    user_id: user.id,
    email,
  });
  return user.id;
}

function createOfferWithDetails(args: Row, store: InMemoryStore) {
  const details = objects(args, "p_details");
  const distinct = new Set(details.map((detail) => detail.offer_type));
  if (details.length !== 3 || distinct.size !== 3) {
    throw new StoreFailure(
      "P0001",
      "an offer needs exactly one basic, standard and premium detail",
    );
  }

  const offer = store.insert("offers", {
    creator_id: num(args, "p_creator_id"),
    title: text(args, "p_title"),
    description: text(args, "p_description") ?? "",
    image: text(args, "p_image"),
  });

  const ordered = [...details].sort(
    (a, b) => tierRank(a.offer_type) - tierRank(b.offer_type),
  );
  for (const detail of ordered) {
    const values = detailValues(detail);
    store.insert("offer_details", {
      offer_id: offer.id,
      offer_type: detail.offer_type,
      title: values.title,
      revisions: values.revisions ?? 0,
      delivery_time_in_days: values.delivery_time_in_days,
      price: values.price,
      features: values.features ?? [],
    });
  }
  return offer.id;
}

function updateOfferWithDetails(args: Row, store: InMemoryStore) {
  const offerId = num(args, "p_offer_id");
  const patch: Row = {};
  const title = text(args, "p_title");
  const description = text(args, "p_description");
  if (title !== null) patch.title = title;
  if (description !== null) patch.description = description;
  if (args.p_set_image === true) patch.image = text(args, "p_image");

  const updated = store.update("offers", (row) => row.id === offerId, patch);
  if (!updated.length) {
    throw new StoreFailure("P0002", `offer ${offerId} not found`);
  }

  for (const detail of objects(args, "p_details")) {
    const values = detailValues(detail);
    const changes: Row = {};
    for (const [key, value] of Object.entries(values)) {
      if (value !== null) changes[key] = value;
    }
    const touched = store.update(
      "offer_details",
      (row) => row.offer_id === offerId && row.offer_type === detail.offer_type,
      changes,
    );
    if (!touched.length) {
      throw new StoreFailure("P0002", `offer ${offerId} has no ${String(detail.offer_type)} tier`);
    }
  }
  return null;
}

function createOrderFromOfferDetail(args: Row, store: InMemoryStore) {
  const detailId = num(args, "p_offer_detail_id");
  const detail = store.find("offer_details", (row) => row.id === detailId);
  if (!detail) {
    throw new StoreFailure("P0002", `offer detail ${detailId} not found`);
  }
  const offer = store.find("offers", (row) => row.id === detail.offer_id);
  if (!offer) {
    throw new StoreFailure("P0002", `offer for detail ${detailId} not found`);
  }

  return store.insert("orders", {
    customer_user_id: num(args, "p_customer_user_id"),
    business_user_id: offer.creator_id,
    offer_id: detail.offer_id,
    offer_detail_id: detail.id,
    title: detail.title,
    revisions: detail.revisions,
    delivery_time_in_days: detail.delivery_time_in_days,
    price: detail.price,
    features: detail.features,
    offer_type: detail.offer_type,
  });
}

const USER_FIELDS = ["first_name", "last_name", "email"];
const PROFILE_FIELDS = ["location", "tel", "description", "email"];

function updateProfile(args: Row, store: InMemoryStore) {
  const userId = num(args, "p_user_id");
  const changes = isRow(args.p_changes) ? args.p_changes : {};

  const pick = (fields: string[]) => {
    const picked: Row = {};
    for (const field of fields) {
      const value = changes[field];
      if (typeof value === "string") picked[field] = value;
    }
    return picked;
  };

  const [user] = store.update("users", (row) => row.id === userId, pick(USER_FIELDS));
  if (!user) {
    throw new StoreFailure("P0002", `user ${userId} not found`);
  }

  const business = user.user_type === "business";
  const profileChanges = pick(business ? [...PROFILE_FIELDS, "working_hours"] : PROFILE_FIELDS);
  if ("file" in changes) {
    profileChanges.file = typeof changes.file === "string" ? changes.file : null;
  }
  store.update(
    business ? "business_profiles" : "customer_profiles",
    (row) => row.user_id === userId,
    profileChanges,
  );
  return null;
}

export const marketplaceSchema: SchemaDefinition = {
  tables: {
    users: {
      uniqueKeys: [["username"], ["auth_user_id"]],
      createdAt: true,
      defaults: () => ({ first_name: "", last_name: "", is_staff: false }),
      referencedBy: [
        { table: "business_profiles", column: "user_id", onDelete: "cascade" },
        { table: "customer_profiles", column: "user_id", onDelete: "cascade" },
        { table: "offers", column: "creator_id", onDelete: "cascade" },
        { table: "orders", column: "customer_user_id", onDelete: "cascade" },
        { table: "orders", column: "business_user_id", onDelete: "cascade" },
        { table: "reviews", column: "business_user_id", onDelete: "cascade" },
        { table: "reviews", column: "reviewer_id", onDelete: "cascade" },
      ],
    },
    business_profiles: {
      uniqueKeys: [["user_id"]],
      createdAt: true,
      updatedAt: true,
      defaults: () => ({
        company_name: "",
        description: "",
        tel: "",
        email: "",
        location: "",
        working_hours: "",
        file: null,
      }),
    },
    customer_profiles: {
      uniqueKeys: [["user_id"]],
      createdAt: true,
      updatedAt: true,
      defaults: () => ({ description: "", tel: "", email: "", location: "", file: null }),
    },
    offers: {
      createdAt: true,
      updatedAt: true,
      defaults: () => ({ description: "", image: null }),
      referencedBy: [
        { table: "offer_details", column: "offer_id", onDelete: "cascade" },
        { table: "orders", column: "offer_id", onDelete: "set null" },
      ],
    },
    offer_details: {
      uniqueKeys: [["offer_id", "offer_type"]],
      defaults: () => ({ revisions: 0, features: [] }),
      referencedBy: [{ table: "orders", column: "offer_detail_id", onDelete: "set null" }],
    },
    orders: {
      createdAt: true,
      updatedAt: true,
      defaults: () => ({
        status: "pending",
        completed_at: null,
        offer_id: null,
        offer_detail_id: null,
        features: [],
      }),
    },
    reviews: {
      uniqueKeys: [["reviewer_id", "business_user_id"]],
      createdAt: true,
      updatedAt: true,
      defaults: () => ({ description: "" }),
    },
  },
  views: {
    offer_summaries: offerSummaries,
    profile_details: profileDetails,
    review_stats: reviewStats,
  },
  rpc: {
    register_account: registerAccount,
    create_offer_with_details: createOfferWithDetails,
    update_offer_with_details: updateOfferWithDetails,
    create_order_from_offer_detail: createOrderFromOfferDetail,
    update_profile: updateProfile,
  },
};

export function setupMarketplaceMock() {
  return setupSupabaseMock(marketplaceSchema);
}

export type SeededUser = {
  id: number;
  authUserId: string;
  username: string;
  email: string;
  password: string;
  token: string;
};

export function seedUser(
  store: InMemoryStore,
  options: {
    username: string;
    type: "customer" | "business";
    email?: string;
    password?: string;
    firstName?: string;
    lastName?: string;
    isStaff?: boolean;
  },
): SeededUser {
  const email = options.email ?? `${options.username}@example.test`;
  const password = options.password ?? "test-password";
  const authUser = store.createAuthUser(email, password);
  const id = store.callRpc("register_account", {
    p_auth_user_id: authUser.id,
    p_username: options.username,
    p_email: email,
    p_first_name: options.firstName ?? "",
    p_last_name: options.lastName ?? "",
    p_user_type: options.type,
  });
  if (typeof id !== "number") {
    throw new Error("register_account returned no id");
  }
  if (options.isStaff) {
    store.update("users", (row) => row.id === id, { is_staff: true });
  }
  return {
    id,
    authUserId: authUser.id,
    username: options.username,
    email,
    password,
    token: store.issueToken(authUser.id),
  };
}

export type TierSeed = { price: number; deliveryDays: number };

export type SeededOffer = { id: number; detailIds: Record<Tier, number> };

/** Creates an offer with all three tiers; prices and delivery days default to 100/200/300 and 7/5/3. */
export function seedOffer(
  store: InMemoryStore,
  options: {
    creatorId: number;
    title: string;
    description?: string;
    tiers?: Partial<Record<Tier, TierSeed>>;
  },
): SeededOffer {
  const fallback: Record<Tier, TierSeed> = {
    basic: { price: 100, deliveryDays: 7 },
    standard: { price: 200, deliveryDays: 5 },
    premium: { price: 300, deliveryDays: 3 },
  };
  const id = store.callRpc("create_offer_with_details", {
    p_creator_id: options.creatorId,
    p_title: options.title,
    p_description: options.description ?? "",
    p_image: null,
    p_details: TIERS.map((tier) => {
      const seed = options.tiers?.[tier] ?? fallback[tier];
      return {
        offer_type: tier,
        title: `${options.title} ${tier}`,
        revisions: 1,
        delivery_time_in_days: seed.deliveryDays,
        price: seed.price,
        features: [`${tier} feature`],
      };
    }),
  });
  if (typeof id !== "number") {
    throw new Error("create_offer_with_details returned no id");
  }

  const detailIds: Record<Tier, number> = { basic: 0, standard: 0, premium: 0 };
  for (const detail of store.rows("offer_details")) {
    if (detail.offer_id !== id) continue;
    const tier = TIERS.find((candidate) => candidate === detail.offer_type);
    if (tier && typeof detail.id === "number") detailIds[tier] = detail.id;
  }
  return { id, detailIds };
}

export function seedOrder(
  store: InMemoryStore,
  options: { customerId: number; offerDetailId: number; status?: string },
): Row {
  const order = store.callRpc("create_order_from_offer_detail", {
    p_offer_detail_id: options.offerDetailId,
    p_customer_user_id: options.customerId,
  });
  if (typeof order !== "object" || order === null || !("id" in order)) {
    throw new Error("create_order_from_offer_detail returned no row");
  }
  const orderId = order.id;
  if (options.status) {
    const [updated] = store.update("orders", (row) => row.id === orderId, {
      status: options.status,
      completed_at: options.status === "completed" ? store.now() : null,
    });
    return updated;
  }
  return store.find("orders", (row) => row.id === orderId) ?? {};
}

export function seedReview(
  store: InMemoryStore,
  options: { reviewerId: number; businessUserId: number; rating: number; description?: string },
): Row {
  return store.insert("reviews", {
    reviewer_id: options.reviewerId,
    business_user_id: options.businessUserId,
    rating: options.rating,
    description: options.description ?? "",
  });
}
