// Row shapes of the storefront tables as PostgREST returns them.

export interface ProductRow {
    id: number;
    brand_name: string;
    product_name: string;
    image_url: string;
    price: number | string; // numeric
    discount: number | string; // numeric
    likes: string | null; // string-encoded integer
    reviews: string;
    is_favorite: boolean;
    category: string;
    created_at: string;
}

export interface CartItemRow {
    id: number;
    user_id: number;
    product_id: number;
    quantity: number;
    selected_options: string;
    created_at: string;
    updated_at: string;
}

export interface ViewHistoryRow {
    id: number;
    user_id: number;
    product_id: number;
    viewed_at: string;
    created_at: string;
}

export interface QaRow {
    id: number;
    product_id: number;
    question: string;
    answer: string;
    user_name: string;
    created_at: string;
    answered_at: string | null;
}

export interface ReviewRow {
    id: number;
    product_id: number;
    user_name: string;
    rating: number;
    content: string;
    created_at: string;
}

export interface StorefrontTables {
    products: ProductRow;
    cart_items: CartItemRow;
    view_history: ViewHistoryRow;
    qa: QaRow;
    reviews: ReviewRow;
}

export type TableName = keyof StorefrontTables;
export type TableRow<K extends TableName> = StorefrontTables[K];

// Columns the database fills in on insert.
export type GeneratedColumns = 'id' | 'created_at' | 'updated_at';
export type InsertRow<K extends TableName> = Omit<TableRow<K>, GeneratedColumns & keyof TableRow<K>>;
