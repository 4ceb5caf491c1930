import express from 'express';
import PropertyController from '../controllers/property.controller';
import { requireUserType } from '../middleware/auth.middleware';
import { upload } from '../middleware/upload.middleware';
import { MAX_PROPERTY_IMAGES } from '../utils/constants';

const getPropertyRoutes = () => {
    const router = express.Router();
    const controller = new PropertyController();
    const ownerOnly = requireUserType('owner', 'admin');

    // Reference data
    router.get('/cities', controller.getCities);
    router.get('/cities/:id/neighborhoods', controller.getNeighborhoods);
    router.get('/amenities', controller.getAmenities);

    router.get('/', controller.getProperties);
    router.get('/mine', ownerOnly, controller.getOwnerProperties);
    router.post('/', ownerOnly, upload.array('images', MAX_PROPERTY_IMAGES), controller.create);
    router.get('/:id', controller.getPropertyDetails);
    router.put('/:id', ownerOnly, controller.update);
    router.delete('/:id', ownerOnly, controller.deleteProperty);

    router.post(
        '/:id/images',
        ownerOnly,
        upload.array('images', MAX_PROPERTY_IMAGES),
        controller.addImages,
    );
    router.post('/:id/images/:imageId/main', ownerOnly, controller.setMainImage);
    router.delete('/:id/images/:imageId', ownerOnly, controller.deleteImage);

    router.post('/:id/publish', ownerOnly, controller.publish);
    router.post('/:id/unpublish', ownerOnly, controller.unpublish);

    router.get('/:id/availability', controller.checkAvailability);
    router.get('/:id/unavailability', controller.getUnavailabilities);
    router.post('/:id/unavailability', ownerOnly, controller.addUnavailability);
    router.delete('/:id/unavailability/:entryId', ownerOnly, controller.removeUnavailability);

    router.put('/:id/discounts', ownerOnly, controller.replaceDiscounts);
    router.get('/:id/quote', controller.getQuote);

    return router;
};

export default getPropertyRoutes;
