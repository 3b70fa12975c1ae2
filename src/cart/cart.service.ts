import { Injectable, InternalServerErrorException, Logger, NotFoundException } from '@nestjs/common';
import { DatabaseService } from '../common/database/database.service';
import { CartItemRow, ProductRow } from '../common/types/storefront.types';

export interface CartLine {
    cartItemId: number;
    userId: number;
    quantity: number;
    product: ProductRow;
}

export interface CartAddResult {
    item: CartItemRow;
    created: boolean;
}

@Injectable()
export class CartService {
    private readonly logger = new Logger(CartService.name);

    constructor(private readonly database: DatabaseService) {}

    private cartItems() {
        return this.database.from('cart_items');
    }

    async findItem(userId: number, productId: number): Promise<CartItemRow | null> {
        const rows = await this.cartItems()
            .select()
            .equals('user_id', userId)
            .equals('product_id', productId)
            .execute();
        return rows[0] ?? null;
    }

    /** The cart row for a user and product, only while it holds a positive quantity. */
    async findActiveItem(userId: number, productId: number): Promise<CartItemRow | null> {
        const rows = await this.cartItems()
            .select()
            .equals('user_id', userId)
            .equals('product_id', productId)
            .greaterThan('quantity', 0)
            .execute();
        return rows[0] ?? null;
    }

    /**
     * Adds `quantity` to the existing row or inserts a new one.
     * NOTE: check-then-write, not atomic; two concurrent adds can both insert or lose an increment.
     */
    async addItem(userId: number, productId: number, quantity: number, selectedOptions = ''): Promise<CartAddResult> {
        const existing = await this.findItem(userId, productId);
        if (existing) {
            const newQuantity = existing.quantity + quantity;
            const [item] = await this.cartItems()
                .update({ quantity: newQuantity, updated_at: new Date().toISOString() })
                .equals('user_id', userId)
                .equals('product_id', productId)
                .execute();
            this.logger.log(`Cart item for user ${userId}, product ${productId} now has quantity ${newQuantity}`);
            return { item: item ?? { ...existing, quantity: newQuantity }, created: false };
        }

        const [item] = await this.cartItems()
            .insert({ user_id: userId, product_id: productId, quantity, selected_options: selectedOptions })
            .execute();
        if (!item) {
            throw new InternalServerErrorException('Cart insert returned no row');
        }
        this.logger.log(`Cart item ${item.id} created for user ${userId}, product ${productId} (quantity ${quantity})`);
        return { item, created: true };
    }

    /** Deletes the row for the pair; resolves with how many rows went away (0 when absent). */
    async removeItem(userId: number, productId: number): Promise<number> {
        const removed = await this.cartItems()
            .delete()
            .equals('user_id', userId)
            .equals('product_id', productId)
            .execute();
        this.logger.log(`Removed ${removed.length} cart item(s) for user ${userId}, product ${productId}`);
        return removed.length;
    }

    /**
     * Sets the quantity of an existing row. A missing row is left missing, not created;
     * resolves with `null` in that case.
     */
    async setQuantity(userId: number, productId: number, quantity: number): Promise<CartItemRow | null> {
        const [item] = await this.cartItems()
            .update({ quantity, updated_at: new Date().toISOString() })
            .equals('user_id', userId)
            .equals('product_id', productId)
            .execute();
        if (!item) {
            this.logger.warn(`No cart item to update for user ${userId}, product ${productId}`);
            return null;
        }
        return item;
    }

    async updateItem(cartItemId: number, updates: Pick<Partial<CartItemRow>, 'quantity' | 'selected_options'>): Promise<CartItemRow> {
        const [item] = await this.cartItems()
            .update({ ...updates, updated_at: new Date().toISOString() })
            .equals('id', cartItemId)
            .execute();
        if (!item) {
            throw new NotFoundException('Cart item not found');
        }
        return item;
    }

    async removeItemById(cartItemId: number): Promise<void> {
        const removed = await this.cartItems().delete().equals('id', cartItemId).execute();
        if (removed.length === 0) {
            throw new NotFoundException('Cart item not found');
        }
    }

    /** Cart rows with a positive quantity and their product, newest first. */
    async listActive(userId?: number): Promise<CartLine[]> {
        let query = this.cartItems()
            .select()
            .embed('product', 'products', 'product_id')
            .greaterThan('quantity', 0);
        if (userId !== undefined) {
            query = query.equals('user_id', userId);
        }
        const rows = await query.orderBy('created_at', true).execute();

        const lines: CartLine[] = [];
        for (const row of rows) {
            if (!row.product) {
                this.logger.warn(`Cart item ${row.id} references missing product ${row.product_id}; skipped`);
                continue;
            }
            lines.push({ cartItemId: row.id, userId: row.user_id, quantity: row.quantity, product: row.product });
        }
        this.logger.log(`Listed ${lines.length} cart items${userId !== undefined ? ` for user ${userId}` : ''}`);
        return lines;
    }
}
