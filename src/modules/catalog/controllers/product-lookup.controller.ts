import {
  Body,
  Controller,
  Get,
  HttpCode,
  Inject,
  NotFoundException,
  Param,
  Post,
  Query,
  ServiceUnavailableException,
  UseGuards,
} from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import {
  CATALOG_REFRESHING_MESSAGE,
  SKU_NOT_FOUND_MESSAGE,
  VARIANT_NOT_FOUND_MESSAGE,
} from '@/common/constants/error-messages.constants';
import type { MetricsPort } from '../application/ports/metrics.port';
import { METRICS_PORT } from '../application/ports/tokens';
import { CatalogStore } from '../application/services/catalog-store';
import { ProductLookupQueryDto } from '../dto/product-lookup-query.dto';
import {
  toProductSummaryDto,
  toVariantDto,
  type ProductLookupResponseDto,
  type VariantLookupResponseDto,
} from '../dto/product-lookup-response.dto';
import { VariantsLookupRequestDto } from '../dto/variants-lookup-request.dto';

@Controller('catalog')
@UseGuards(ThrottlerGuard)
export class ProductLookupController {
  constructor(
    private readonly catalogStore: CatalogStore,
    @Inject(METRICS_PORT)
    private readonly metricsPort: MetricsPort,
  ) {}

  @Get('lookup')
  lookupVariant(@Query() query: ProductLookupQueryDto): VariantLookupResponseDto {
    const result = this.catalogStore.lookup(query.sku, query.variant);
    this.metricsPort.incrementLookup({ kind: 'variant', outcome: result.status });

    switch (result.status) {
      case 'refreshing':
        throw new ServiceUnavailableException(CATALOG_REFRESHING_MESSAGE);
      case 'sku_not_found':
        throw skuNotFound(result.sku);
      case 'variant_not_found':
        throw variantNotFound(result.sku, result.invalidVariants, result.availableVariants);
      case 'found':
        return {
          ok: true,
          product: toProductSummaryDto(result.product),
          variant: toVariantDto(result.variant),
          image_url: result.imageUrl,
        };
    }
  }

  @Get('products/:sku')
  lookupProduct(@Param('sku') sku: string): ProductLookupResponseDto {
    const result = this.catalogStore.lookupProduct(sku);
    this.metricsPort.incrementLookup({ kind: 'product', outcome: result.status });

    switch (result.status) {
      case 'refreshing':
        throw new ServiceUnavailableException(CATALOG_REFRESHING_MESSAGE);
      case 'sku_not_found':
        throw skuNotFound(result.sku);
      case 'found':
        return {
          ok: true,
          product: toProductSummaryDto(result.product),
          variants: result.product.variants.map(toVariantDto),
          image_url: result.imageUrl,
        };
    }
  }

  @Post('lookup/variants')
  @HttpCode(200)
  lookupVariants(@Body() body: VariantsLookupRequestDto): ProductLookupResponseDto {
    const result = this.catalogStore.lookupVariants(body.sku, body.variants);
    this.metricsPort.incrementLookup({ kind: 'variants', outcome: result.status });

    switch (result.status) {
      case 'refreshing':
        throw new ServiceUnavailableException(CATALOG_REFRESHING_MESSAGE);
      case 'sku_not_found':
        throw skuNotFound(result.sku);
      case 'variant_not_found':
        throw variantNotFound(result.sku, result.invalidVariants, result.availableVariants);
      case 'found':
        return {
          ok: true,
          product: toProductSummaryDto(result.product),
          variants: result.variants.map(toVariantDto),
          image_url: result.imageUrl,
        };
    }
  }
}

function skuNotFound(sku: string): NotFoundException {
  return new NotFoundException({
    message: SKU_NOT_FOUND_MESSAGE,
    details: { reason: 'sku_not_found', sku },
  });
}

function variantNotFound(
  sku: string,
  invalidVariants: string[],
  availableVariants: string[],
): NotFoundException {
  return new NotFoundException({
    message: VARIANT_NOT_FOUND_MESSAGE,
    details: {
      reason: 'variant_not_found',
      sku,
      invalid_variants: invalidVariants,
      available_variants: availableVariants,
    },
  });
}
