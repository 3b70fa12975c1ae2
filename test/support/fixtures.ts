import { Seed } from './in-memory-query-executor';

export function storefrontSeed(): Seed {
    return {
        products: [
            {
                id: 1, brand_name: 'Northwind', product_name: 'Canvas Sneakers', image_url: 'https://img.example.test/1.png',
                price: 15000, discount: 10, likes: '3', reviews: '12', is_favorite: false, category: 'shoes',
                created_at: '2024-03-01T00:00:00.000Z',
            },
            {
                id: 2, brand_name: 'Contoso', product_name: 'Trail Runner', image_url: 'https://img.example.test/2.png',
                price: '89000.50', discount: '25', likes: '7', reviews: '4', is_favorite: true, category: 'shoes',
                created_at: '2024-03-02T00:00:00.000Z',
            },
            {
                id: 3, brand_name: 'Fabrikam', product_name: 'Cotton Hoodie', image_url: 'https://img.example.test/3.png',
                price: 1234567, discount: 0, likes: '0', reviews: '0', is_favorite: false, category: 'tops',
                created_at: '2024-03-03T00:00:00.000Z',
            },
            {
                id: 4, brand_name: 'Northwind', product_name: 'Denim Jacket', image_url: 'https://img.example.test/4.png',
                price: 99000, discount: 5, likes: '5', reviews: '2', is_favorite: true, category: 'outer',
                created_at: '2024-03-04T00:00:00.000Z',
            },
        ],
        cart_items: [
            { id: 1, user_id: 5, product_id: 1, quantity: 2, selected_options: 'size:260', created_at: '2024-04-01T00:00:00.000Z', updated_at: '2024-04-01T00:00:00.000Z' },
            { id: 2, user_id: 5, product_id: 4, quantity: 1, selected_options: '', created_at: '2024-04-02T00:00:00.000Z', updated_at: '2024-04-02T00:00:00.000Z' },
            { id: 3, user_id: 5, product_id: 3, quantity: 0, selected_options: '', created_at: '2024-04-03T00:00:00.000Z', updated_at: '2024-04-03T00:00:00.000Z' },
            { id: 4, user_id: 9, product_id: 2, quantity: 1, selected_options: '', created_at: '2024-04-04T00:00:00.000Z', updated_at: '2024-04-04T00:00:00.000Z' },
        ],
        view_history: [
            { id: 1, user_id: 5, product_id: 2, viewed_at: '2024-05-01T00:00:00.000Z', created_at: '2024-05-01T00:00:00.000Z' },
            { id: 2, user_id: 5, product_id: 3, viewed_at: '2024-05-03T00:00:00.000Z', created_at: '2024-05-03T00:00:00.000Z' },
            { id: 3, user_id: 5, product_id: 1, viewed_at: '2024-05-02T00:00:00.000Z', created_at: '2024-05-02T00:00:00.000Z' },
        ],
        reviews: [
            { id: 1, product_id: 1, user_name: 'jisoo', rating: 4, content: 'Comfortable', created_at: '2024-06-01T00:00:00.000Z' },
            { id: 2, product_id: 1, user_name: 'alex', rating: 2, content: 'Runs small', created_at: '2024-06-02T00:00:00.000Z' },
            { id: 3, product_id: 2, user_name: 'sam', rating: 5, content: 'Light and grippy', created_at: '2024-06-03T00:00:00.000Z' },
        ],
        qa: [
            {
                id: 1, product_id: 1, user_name: 'jisoo', question: 'Is it waterproof?', answer: '',
                created_at: '2024-07-01T00:00:00.000Z', answered_at: null,
            },
        ],
    };
}
