import { Body, Controller, Get, HttpStatus, Param, ParseIntPipe, Patch, Post, ValidationPipe } from '@nestjs/common';
import { QaService } from './qa.service';
import { CreateQaDto, UpdateQaDto } from './dto/qa.dto';
import { QaRow } from '../common/types/storefront.types';
import { createEnvelope, ResponseEnvelope } from '../common/response/envelope';

@Controller()
export class QaController {
    constructor(private readonly qaService: QaService) {}

    @Get('products/:productId/qa')
    async listQuestions(@Param('productId', ParseIntPipe) productId: number): Promise<ResponseEnvelope<QaRow[]>> {
        return createEnvelope(await this.qaService.listForProduct(productId));
    }

    @Post('products/:productId/qa')
    async askQuestion(
        @Param('productId', ParseIntPipe) productId: number,
        @Body(new ValidationPipe({ whitelist: true })) body: CreateQaDto,
    ): Promise<ResponseEnvelope<QaRow>> {
        return createEnvelope(await this.qaService.ask(productId, body), 'Question submitted', HttpStatus.CREATED);
    }

    @Patch('qa/:qaId')
    async updateQuestion(
        @Param('qaId', ParseIntPipe) qaId: number,
        @Body(new ValidationPipe({ whitelist: true })) body: UpdateQaDto,
    ): Promise<ResponseEnvelope<QaRow>> {
        return createEnvelope(await this.qaService.update(qaId, body), 'Q&A updated');
    }
}
