import { Injectable, InternalServerErrorException, Logger, NotFoundException } from '@nestjs/common';
import { DatabaseService } from '../common/database/database.service';
import { QaRow } from '../common/types/storefront.types';
import { ProductsService } from '../products/products.service';
import { CreateQaDto, UpdateQaDto } from './dto/qa.dto';

@Injectable()
export class QaService {
    private readonly logger = new Logger(QaService.name);

    constructor(
        private readonly database: DatabaseService,
        private readonly productsService: ProductsService,
    ) {}

    private qa() {
        return this.database.from('qa');
    }

    async listForProduct(productId: number): Promise<QaRow[]> {
        await this.productsService.getById(productId);
        return this.qa().select().equals('product_id', productId).orderBy('created_at', true).execute();
    }

    /** New questions start unanswered. */
    async ask(productId: number, question: CreateQaDto): Promise<QaRow> {
        await this.productsService.getById(productId);
        const [created] = await this.qa()
            .insert({
                product_id: productId,
                user_name: question.user_name,
                question: question.question,
                answer: '',
                answered_at: null,
            })
            .execute();
        if (!created) {
            throw new InternalServerErrorException('Question insert returned no row');
        }
        this.logger.log(`Question ${created.id} asked on product ${productId}`);
        return created;
    }

    /** Partial update; a non-empty answer stamps `answered_at`, clearing it resets the stamp. */
    async update(qaId: number, updates: UpdateQaDto): Promise<QaRow> {
        const changes: Partial<QaRow> = { ...updates };
        if (updates.answer !== undefined) {
            changes.answered_at = updates.answer.trim() ? new Date().toISOString() : null;
        }
        const [updated] = await this.qa().update(changes).equals('id', qaId).execute();
        if (!updated) {
            this.logger.warn(`Q&A entry not found - id: ${qaId}`);
            throw new NotFoundException('Q&A entry not found');
        }
        return updated;
    }
}
