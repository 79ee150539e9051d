import { Router } from 'express';
import type { ProductService } from '../../../services/productService';
import { createProductController } from '../controllers/productController';
import { methodNotAllowed, requireJson } from '../../../middleware/requestMiddleware';

export const createProductRoutes = (service: ProductService): Router => {
  const {
    getAllProducts,
    getProductById,
    createNewProduct,
    updateExistingProduct,
    deleteExistingProduct
  } = createProductController(service);

  const router = Router();

  router.route('/')
    .get(getAllProducts)
    .post(requireJson, createNewProduct)
    .all(methodNotAllowed);

  router.route('/:id')
    .get(getProductById)
    .put(requireJson, updateExistingProduct)
    .delete(deleteExistingProduct)
    .all(methodNotAllowed);

  return router;
};

export default createProductRoutes;
